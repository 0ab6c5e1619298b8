import type { AnalysisFailure } from "@collabscope/core";

export type CommandResult =
  | { ok: true; rendered: string; empty: boolean }
  | { ok: false; message: string };

export const commandFailure = (failure: AnalysisFailure): CommandResult => ({
  ok: false,
  message: failure.error.message,
});
