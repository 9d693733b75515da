import { homedir } from "node:os";
import { sep } from "node:path";

export interface SanitizeOptions {
  /** Project root; absolute paths under it are rendered relative to it. */
  root?: string;
  /** Literal secret values (API keys in use) to redact wherever they appear. */
  secrets?: readonly (string | undefined)[];
}

const REDACTED = "[REDACTED]";

const CREDENTIAL_PATTERNS: RegExp[] = [
  /\bsk-(?:ant-|proj-)?[A-Za-z0-9_-]{16,}/g,
  /\bAIza[0-9A-Za-z_-]{30,}/g,
  /\b(?:ghp|gho|ghs|github_pat)_[A-Za-z0-9_]{20,}/g,
  /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/gi,
  /\b((?:api[_-]?key|access[_-]?token|token|secret|password|passwd)\s*[=:]\s*)["']?[^\s"'&,;]{4,}["']?/gi,
  /([?&]key=)[^&\s]+/g,
];

// Matches what is left of an absolute POSIX path once known roots are stripped.
const ABSOLUTE_PATH = /(^|[\s"'`(=:])\/(?:[^\s"'`()/]+\/)+([^\s"'`()/]+)/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function stripRoot(message: string, root: string): string {
  const normalized = root.endsWith(sep) ? root.slice(0, -1) : root;
  if (normalized.length <= 1) return message;
  const withinRoot = message.split(normalized + sep).join("");
  return withinRoot.replace(new RegExp(`${escapeRegExp(normalized)}(?![\\w.-])`, "g"), ".");
}

export function redactSecrets(message: string, secrets: readonly (string | undefined)[] = []): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length >= 4) {
      result = result.split(secret).join(REDACTED);
    }
  }
  for (const pattern of CREDENTIAL_PATTERNS) {
    result = result.replace(pattern, (match, prefix: unknown) =>
      typeof prefix === "string" && match.startsWith(prefix) && prefix !== match
        ? `${prefix}${REDACTED}`
        : REDACTED
    );
  }
  return result;
}

/**
 * Strips absolute filesystem locations and credential-looking substrings from
 * a message before it leaves the process. Paths under the project root become
 * relative; other absolute paths are reduced to their final segment.
 */
export function sanitizeMessage(message: string, options: SanitizeOptions = {}): string {
  let result = redactSecrets(message, options.secrets);

  if (options.root) {
    result = stripRoot(result, options.root);
  }
  const home = homedir();
  if (home.length > 1) {
    result = result.split(home).join("~");
  }

  return result.replace(ABSOLUTE_PATH, (_match, lead: string, last: string) => `${lead}${last}`);
}
