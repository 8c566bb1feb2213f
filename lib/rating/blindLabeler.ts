import { createHash } from "node:crypto";
import type { Presentation, ReportRecord } from "@/lib/rating/types";

/** Returns true when the modified variant should be shown. */
export type VariantChooser = (username: string, caseId: string) => boolean;

export function hashChooser(salt: string): VariantChooser {
  return (username, caseId) => {
    const digest = createHash("sha256").update(`${salt}\u0000${username}\u0000${caseId}`, "utf8").digest();
    return (digest[0] & 1) === 1;
  };
}

/**
 * Picks which variant of a report a rater sees. The choice is a pure function
 * of (user, case), so refreshing or restarting never flips it.
 */
export class BlindLabeler {
  private readonly choose: VariantChooser;

  constructor(opts: { salt: string; chooser?: VariantChooser }) {
    this.choose = opts.chooser ?? hashChooser(opts.salt);
  }

  present(username: string, record: ReportRecord, position: number, total: number): Presentation {
    if (record.kind === "single") {
      return {
        item: { caseId: record.caseId, text: record.text, position, total },
        shownModified: false,
      };
    }
    const shownModified = this.choose(username, record.caseId);
    return {
      item: {
        caseId: record.caseId,
        text: shownModified ? record.modified : record.original,
        position,
        total,
      },
      shownModified,
    };
  }
}
