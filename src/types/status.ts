/**
 * Parse status signals
 *
 * Several signals may be raised at once. Only one of them decides what the
 * program does next, see {@link governingAction}.
 */

export interface ParseStatus {
  helpRequested: boolean;
  versionRequested: boolean;
  unrecognizedOptions: boolean;
  noInputFiles: boolean;
}

export type StatusAction =
  | "unrecognized-options"
  | "help"
  | "version"
  | "no-inputs"
  | "convert";

export function emptyStatus(): ParseStatus {
  return {
    helpRequested: false,
    versionRequested: false,
    unrecognizedOptions: false,
    noInputFiles: false,
  };
}

export function mergeStatus(
  base: ParseStatus,
  extra: Partial<ParseStatus>,
): ParseStatus {
  return {
    helpRequested: base.helpRequested || extra.helpRequested === true,
    versionRequested: base.versionRequested || extra.versionRequested === true,
    unrecognizedOptions:
      base.unrecognizedOptions || extra.unrecognizedOptions === true,
    noInputFiles: base.noInputFiles || extra.noInputFiles === true,
  };
}

export function governingAction(status: ParseStatus): StatusAction {
  if (status.unrecognizedOptions) return "unrecognized-options";
  if (status.helpRequested) return "help";
  if (status.versionRequested) return "version";
  if (status.noInputFiles) return "no-inputs";
  return "convert";
}
