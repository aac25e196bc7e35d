import { type Static, Type as t } from "@sinclair/typebox";

import type { Result } from "~shared/utils/Result";

import { productTypes, sites } from "@/constants";

export const specialCaseActions = [
  "append-next-day",
  "merge-subfolders",
  "separate-by-latitude",
] as const;

export const SpecialCaseSchema = t.Object({
  date: t.String({ pattern: "^\\d{8}[a-z]?$" }),
  site: t.Optional(t.Union(sites.map((s) => t.Literal(s)))),
  product: t.Optional(t.Union(productTypes.map((p) => t.Literal(p)))),
  action: t.Union(specialCaseActions.map((a) => t.Literal(a))),
  folders: t.Optional(t.Array(t.String())),
  note: t.String(),
});

export const SpecialCaseFileSchema = t.Object({
  cases: t.Array(SpecialCaseSchema),
});

export type SpecialCase = Static<typeof SpecialCaseSchema>;

/** 套用所有符合的特例後，抓取索引時要做的調整 */
export type FetchAdjustments = {
  dayOffsets: number[];
  folderSuffixes: string[];
  separateByLatitude: boolean;
  notes: string[];
};

export type SpecialCaseError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_FILE"; message: string };

export interface SpecialCaseStore {
  load(): Promise<Result<SpecialCase[], SpecialCaseError>>;
}
