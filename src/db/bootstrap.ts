import { promises as fs } from "fs";
import path from "path";
import type * as pg from "pg";
import { projectRoot } from "../config/paths.js";

export function bundledSchemaPath(): string {
  return path.join(projectRoot(), "db", "schema.sql");
}

export async function applySqlFile(pool: pg.Pool, filePath: string = bundledSchemaPath()): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
