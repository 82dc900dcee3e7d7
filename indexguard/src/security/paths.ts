import { resolve, isAbsolute } from "node:path";

/**
 * Sanitize path component to prevent path traversal attacks.
 * @throws Error if path component is invalid
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component === "." ||
    component === ".." ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component;
}

/**
 * Resolve `components` under `base`, refusing anything that would escape it.
 * Empty components are skipped, so a package at the repository root resolves to `base`.
 * @throws Error if path traversal is detected
 */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }

  const sanitized = components.filter((c) => c !== "").map(sanitizePathComponent);

  const fullPath = resolve(base, ...sanitized);
  const normalizedBase = resolve(base);

  if (!fullPath.startsWith(normalizedBase + "/") && fullPath !== normalizedBase) {
    throw new Error(`Path traversal detected: ${fullPath}`);
  }

  return fullPath;
}

/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Redact credentials from messages before they reach logs.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/\bgh[pousr]_[A-Za-z0-9]+/g, "gh*_***");
  result = result.replace(/\bgithub_pat_[A-Za-z0-9_]+/g, "github_pat_***");
  result = result.replace(/\/\/[^/\s:@]+:[^/\s@]+@/g, "//***@");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/authorization:\s*\S+(\s+\S+)?/gi, "authorization: ***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");

  return result;
}
