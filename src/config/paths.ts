import path from "path";
import { fileURLToPath } from "url";

/** Package root, whether running from sources or from the compiled `dist/` tree. */
export function projectRoot(): string {
  const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");
  return path.basename(root) === "dist" ? path.dirname(root) : root;
}
