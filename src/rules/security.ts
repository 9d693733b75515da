import { isCommentLine, type Rule, type RuleMatch } from "./types.js";

const SECRET_ASSIGNMENT =
  /(?:api[_-]?key|apikey|secret|password|passwd|pwd|token|auth[_-]?token)\s*[:=]\s*['"][^'"]{8,}['"]/i;

const SECRET_PREFIX =
  /['"](?:sk-[a-zA-Z0-9]{20,}|pk-[a-zA-Z0-9]{20,}|ghp_[a-zA-Z0-9]{36,}|gho_[a-zA-Z0-9]{36,}|xox[baprs]-[a-zA-Z0-9-]{10,})['"]/;

const NON_PRODUCTION_PATH = /test|example|mock|fixture|fake/i;

export const hardcodedSecretRule: Rule = {
  id: "SEC001",
  name: "hardcoded-secret",
  focus: "security",
  check(path, lines) {
    if (NON_PRODUCTION_PATH.test(path)) return [];
    const matches: RuleMatch[] = [];
    for (const { number, text } of lines) {
      if (isCommentLine(text)) continue;
      if (SECRET_ASSIGNMENT.test(text)) {
        matches.push({
          line: number,
          severity: "high",
          message: "Potential hardcoded secret detected",
          suggestion: "Use environment variables or a secrets manager",
        });
      } else if (SECRET_PREFIX.test(text)) {
        matches.push({
          line: number,
          severity: "high",
          message: "API key or token detected in code",
          suggestion: "Move it to an environment variable that is not committed",
        });
      }
    }
    return matches;
  },
};

const AWS_ACCESS_KEY = /(?<![A-Z0-9])AKIA[0-9A-Z]{16}(?![A-Z0-9])/;
const AWS_SECRET_KEY = /(?:aws[_-]?secret|secret[_-]?key)\s*[:=]\s*['"]?[A-Za-z0-9/+=]{40}['"]?/i;
const PRIVATE_KEY =
  /-----BEGIN\s+(?:RSA\s+)?(?:EC\s+)?(?:DSA\s+)?(?:OPENSSH\s+)?PRIVATE\s+KEY-----/;
const CONNECTION_STRING =
  /(?:mysql|postgres|postgresql|mongodb|redis):\/\/[^:\s/]+:[^@\s]+@|(?:password|pwd)=[^&\s;]+/i;
const SERVICE_ACCOUNT = /"type"\s*:\s*"service_account"/;

const PLACEHOLDERS = [
  "example",
  "placeholder",
  "your_",
  "xxx",
  "changeme",
  "<password>",
  "${",
  "{{",
  "localhost",
];

function isPlaceholder(text: string): boolean {
  const lower = text.toLowerCase();
  return PLACEHOLDERS.some((placeholder) => lower.includes(placeholder));
}

function credentialMatch(text: string): Omit<RuleMatch, "line"> | null {
  if (AWS_ACCESS_KEY.test(text)) {
    return {
      severity: "high",
      message: "AWS access key ID detected",
      suggestion: "Use IAM roles or environment variables instead",
    };
  }
  if (AWS_SECRET_KEY.test(text)) {
    return {
      severity: "high",
      message: "Potential AWS secret key detected",
      suggestion: "Use IAM roles or AWS Secrets Manager",
    };
  }
  if (PRIVATE_KEY.test(text)) {
    return {
      severity: "high",
      message: "Private key detected in code",
      suggestion: "Keep private keys in a key management system",
    };
  }
  if (CONNECTION_STRING.test(text) && !isPlaceholder(text)) {
    return {
      severity: "high",
      message: "Connection string with credentials detected",
      suggestion: "Use environment variables for connection strings",
    };
  }
  if (SERVICE_ACCOUNT.test(text)) {
    return {
      severity: "high",
      message: "GCP service account key file detected",
      suggestion: "Use Workload Identity or store the key in Secret Manager",
    };
  }
  return null;
}

export const credentialPatternRule: Rule = {
  id: "SEC002",
  name: "credential-pattern",
  focus: "security",
  check(path, lines) {
    if (/test|spec/i.test(path)) return [];
    const matches: RuleMatch[] = [];
    for (const { number, text } of lines) {
      const match = credentialMatch(text);
      if (match) matches.push({ line: number, ...match });
    }
    return matches;
  },
};

const CONFLICT_MARKERS: ReadonlyArray<[RegExp, string]> = [
  [/^<{7}\s/, "start"],
  [/^={7}$/, "separator"],
  [/^>{7}\s/, "end"],
];

export const mergeConflictRule: Rule = {
  id: "SEC003",
  name: "merge-conflict",
  focus: "security",
  check(_path, lines) {
    const matches: RuleMatch[] = [];
    for (const { number, text } of lines) {
      const marker = CONFLICT_MARKERS.find(([pattern]) => pattern.test(text));
      if (marker) {
        matches.push({
          line: number,
          severity: "high",
          message: `Unresolved merge conflict marker (${marker[1]})`,
          suggestion: "Resolve the merge conflict before committing",
        });
      }
    }
    return matches;
  },
};
