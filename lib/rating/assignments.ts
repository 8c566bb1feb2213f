import fs from "node:fs";
import { AssignmentFormatError, UnknownUserError } from "@/lib/rating/errors";
import type { ReportCatalog } from "@/lib/rating/catalog";
import type { Assignment, AssignmentEntry } from "@/lib/rating/types";

/**
 * One line of the mapping file for one user: either the whole collection
 * (in file order) or an explicit list of case ids.
 */
export type AssignmentRule =
  | { collection: string; kind: "collection" }
  | { collection: string; kind: "cases"; caseIds: readonly string[] };

function cleanId(v: unknown) {
  if (typeof v !== "string" && typeof v !== "number") return "";
  return String(v).trim();
}

export function parseAssignmentMapping(mapping: unknown): Map<string, AssignmentRule[]> {
  if (!mapping || typeof mapping !== "object" || Array.isArray(mapping)) {
    throw new AssignmentFormatError("Assignment mapping must be an object keyed by collection name.");
  }

  const rules = new Map<string, AssignmentRule[]>();
  const add = (username: string, rule: AssignmentRule) => {
    const list = rules.get(username) || [];
    list.push(rule);
    rules.set(username, list);
  };

  for (const [rawCollection, value] of Object.entries(mapping)) {
    const collection = rawCollection.trim();
    if (!collection) throw new AssignmentFormatError("Assignment mapping has an empty collection name.");

    if (Array.isArray(value)) {
      for (const u of value) {
        const username = cleanId(u);
        if (!username) throw new AssignmentFormatError(`Collection "${collection}" lists an empty username.`);
        add(username, { collection, kind: "collection" });
      }
      continue;
    }

    if (!value || typeof value !== "object") {
      throw new AssignmentFormatError(`Collection "${collection}" must map to a user list or a user -> cases object.`);
    }

    for (const [rawUser, cases] of Object.entries(value)) {
      const username = rawUser.trim();
      if (!username) throw new AssignmentFormatError(`Collection "${collection}" has an empty username.`);
      if (!Array.isArray(cases)) {
        throw new AssignmentFormatError(`Cases for "${username}" in "${collection}" must be a list.`);
      }
      const caseIds = cases.map(cleanId);
      if (caseIds.some((c) => !c)) {
        throw new AssignmentFormatError(`Cases for "${username}" in "${collection}" contain an empty id.`);
      }
      add(username, { collection, kind: "cases", caseIds: Object.freeze(caseIds) });
    }
  }

  for (const [username, list] of rules) {
    const seen = new Set<string>();
    for (const rule of list) {
      if (rule.kind !== "cases") continue;
      for (const caseId of rule.caseIds) {
        if (seen.has(caseId)) {
          throw new AssignmentFormatError(`Case "${caseId}" is assigned to "${username}" more than once.`);
        }
        seen.add(caseId);
      }
    }
  }

  return rules;
}

export class AssignmentStore {
  private readonly resolved = new Map<string, Assignment>();

  constructor(
    private readonly rules: ReadonlyMap<string, readonly AssignmentRule[]>,
    private readonly catalog: ReportCatalog
  ) {}

  static fromMapping(mapping: unknown, catalog: ReportCatalog) {
    return new AssignmentStore(parseAssignmentMapping(mapping), catalog);
  }

  static fromFile(file: string, catalog: ReportCatalog) {
    let mapping: unknown;
    try {
      mapping = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (e) {
      throw new AssignmentFormatError(`Assignment file ${file} could not be read.`, e);
    }
    return AssignmentStore.fromMapping(mapping, catalog);
  }

  usernames(): string[] {
    return Array.from(this.rules.keys()).sort((a, b) => a.localeCompare(b));
  }

  has(username: string) {
    return this.rules.has(username);
  }

  /** Resolved once per user, then served from memory so order never changes. */
  assignmentFor(username: string): Assignment {
    const hit = this.resolved.get(username);
    if (hit) return hit;

    const rules = this.rules.get(username);
    if (!rules || !rules.length) throw new UnknownUserError(username);

    const entries: AssignmentEntry[] = [];
    const seen = new Set<string>();
    for (const rule of rules) {
      const caseIds = rule.kind === "cases" ? rule.caseIds : this.catalog.load(rule.collection).caseIds;
      for (const caseId of caseIds) {
        if (seen.has(caseId)) {
          throw new AssignmentFormatError(`Case "${caseId}" is assigned to "${username}" more than once.`);
        }
        seen.add(caseId);
        entries.push(Object.freeze({ collection: rule.collection, caseId }));
      }
    }

    const assignment: Assignment = Object.freeze({ username, entries: Object.freeze(entries) });
    this.resolved.set(username, assignment);
    return assignment;
  }

  reportsFor(username: string): readonly string[] {
    return this.assignmentFor(username).entries.map((e) => e.caseId);
  }
}
