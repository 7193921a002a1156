import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url));

/**
 * Runs every migrations/*.sql file in name order. Files are re-runnable.
 *
 * `exec` must accept multi-statement SQL (pg's simple query protocol, PGlite's exec).
 */
export async function applyMigrations(
  exec: (sqlText: string) => Promise<unknown>,
  dir: string = MIGRATIONS_DIR
): Promise<string[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith(".sql")).sort();

  for (const file of files) {
    const sqlText = await readFile(path.join(dir, file), "utf8");
    await exec(sqlText);
    console.log(`[Migrate] Applied ${file}`);
  }

  return files;
}
