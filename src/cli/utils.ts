import * as os from "node:os";
import * as path from "node:path";
import * as dotenv from "dotenv";

/**
 * Loads `.env` from the working directory without overriding variables that
 * are already set. Returns the file used, if any.
 */
export function loadEnvFile(cwd = process.cwd()): string | null {
  const envPath = path.join(cwd, ".env");
  const result = dotenv.config({ path: envPath, override: false });
  return result.error ? null : envPath;
}

/**
 * Shortens a path by replacing the home directory with ~
 */
export function shortenPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}

/** First line of a prompt, cut to `width` characters */
export function promptPreview(prompt: string, width = 60): string {
  const firstLine = prompt.trim().split("\n")[0] ?? "";
  return firstLine.length > width
    ? `${firstLine.slice(0, width - 1)}…`
    : firstLine;
}
