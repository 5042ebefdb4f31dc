import { MalformedInputError } from "@quotegraph/core";
import { Page } from "./Page";

export type SkipReason = "namespace" | "redirect" | "no-text";

export type ReaderItem =
  | { kind: "page"; page: Page }
  | { kind: "skipped"; title: string; reason: SkipReason }
  | { kind: "malformed"; error: MalformedInputError };
