import { createHash } from "node:crypto";

export function createTableId(tableName: string): string {
  return `tbl_${createHash("sha1").update(tableName).digest("hex").slice(0, 16)}`;
}
