import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UserTable } from "@/lib/auth/userTable";
import { makeTempDir, removeDir, writeUsersWorkbook } from "./helpers";

describe("UserTable", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
    vi.restoreAllMocks();
  });

  it("reads users and admin flags from the workbook", () => {
    const file = path.join(root, "users.xlsx");
    writeUsersWorkbook(file, [
      { username: "alice", password: "test-pass-a", is_admin: false },
      { username: "bob", password: 1234, is_admin: true },
    ]);
    const table = UserTable.fromWorkbook(fs.readFileSync(file));
    expect(table.list()).toEqual([
      { username: "alice", isAdmin: false },
      { username: "bob", isAdmin: true },
    ]);
    expect(table.verify("bob", "1234")).toEqual({ username: "bob", isAdmin: true });
  });

  it("makes the first user the admin when there is no admin column", () => {
    const table = UserTable.fromRows([
      { username: "alice", password: "a" },
      { username: "bob", password: "b" },
    ]);
    expect(table.find("alice")?.isAdmin).toBe(true);
    expect(table.find("bob")?.isAdmin).toBe(false);
  });

  it("matches column names loosely and skips rows without a username", () => {
    const table = UserTable.fromRows([
      { " Username ": "carol", Password: "c", "Is Admin": "yes" },
      { " Username ": "", Password: "x", "Is Admin": "no" },
    ]);
    expect(table.list()).toEqual([{ username: "carol", isAdmin: true }]);
  });

  it("checks credentials", () => {
    const table = UserTable.fromRows([{ username: "alice", password: "test-pass" }]);
    expect(table.verify("alice", "test-pass")).toEqual({ username: "alice", isAdmin: true });
    expect(table.verify("alice", "wrong")).toBeNull();
    expect(table.verify("ghost", "test-pass")).toBeNull();
  });

  it("never accepts an empty stored password", () => {
    const table = UserTable.fromRows([{ username: "alice", password: "" }]);
    expect(table.verify("alice", "")).toBeNull();
  });

  it("returns an empty table when the workbook is missing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(UserTable.fromFile(path.join(root, "absent.xlsx")).list()).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
