import fs from "node:fs";
import { createHash, timingSafeEqual } from "node:crypto";
import * as XLSX from "xlsx";

export type RaterUser = {
  username: string;
  isAdmin: boolean;
};

type UserRow = RaterUser & { password: string };

function clean(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v).trim();
}

function normKey(k: string) {
  return k.replace(/\s+/g, " ").replace(/[_-]/g, " ").trim().toLowerCase();
}

function getCell(row: Record<string, unknown>, candidates: string[]) {
  const map = new Map<string, string>();
  for (const k of Object.keys(row)) map.set(normKey(k), k);
  for (const c of candidates) {
    const realKey = map.get(normKey(c));
    if (realKey !== undefined) return { present: true, value: row[realKey] };
  }
  return { present: false, value: undefined };
}

function parseFlag(v: unknown) {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  return ["1", "true", "yes", "y", "on"].includes(clean(v).toLowerCase());
}

function digest(s: string) {
  return createHash("sha256").update(s, "utf8").digest();
}

/**
 * The provisioned raters, read from the first sheet of the users workbook.
 * A workbook without an `is_admin` column makes its first user the admin.
 */
export class UserTable {
  private readonly byName: Map<string, UserRow>;

  constructor(rows: UserRow[]) {
    this.byName = new Map(rows.map((r) => [r.username, r]));
  }

  static fromRows(rows: Record<string, unknown>[]) {
    const hasAdminColumn = rows.some((r) => getCell(r, ["is_admin", "admin"]).present);
    const users: UserRow[] = [];
    for (const row of rows) {
      const username = clean(getCell(row, ["username", "user", "login"]).value);
      if (!username) continue;
      users.push({
        username,
        password: clean(getCell(row, ["password", "pass"]).value),
        isAdmin: hasAdminColumn ? parseFlag(getCell(row, ["is_admin", "admin"]).value) : users.length === 0,
      });
    }
    return new UserTable(users);
  }

  static fromWorkbook(buf: Buffer) {
    const wb = XLSX.read(buf, { type: "buffer" });
    const sheetName = wb.SheetNames[0];
    if (!sheetName) return new UserTable([]);
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets[sheetName], { defval: "" });
    return UserTable.fromRows(rows);
  }

  static fromFile(file: string) {
    if (!fs.existsSync(file)) {
      console.error(JSON.stringify({ level: "error", event: "users-file-missing", file }));
      return new UserTable([]);
    }
    return UserTable.fromWorkbook(fs.readFileSync(file));
  }

  list(): RaterUser[] {
    return Array.from(this.byName.values()).map(({ username, isAdmin }) => ({ username, isAdmin }));
  }

  find(username: string): RaterUser | null {
    const row = this.byName.get(clean(username));
    return row ? { username: row.username, isAdmin: row.isAdmin } : null;
  }

  verify(username: string, password: string): RaterUser | null {
    const row = this.byName.get(clean(username));
    if (!row || !row.password) return null;
    if (!timingSafeEqual(digest(row.password), digest(String(password ?? "")))) return null;
    return { username: row.username, isAdmin: row.isAdmin };
  }
}
