/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PIN_FAILED: 1,
  NO_PINS: 2,
  INVALID_ARGS: 3,
  MANIFEST_UNREADABLE: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type ErrorCode =
  | "CONFIG_INVALID"
  | "MANIFEST_MISSING"
  | "EXTRACT_FAILED"
  | "NO_PINS"
  | "RESOLVE_FAILED"
  | "INVALID_UTF8"
  | "REWRITE_FAILED"
  | "WRITE_FAILED";

export function exitCodeFor(code: ErrorCode): ExitCode {
  switch (code) {
    case "CONFIG_INVALID":
      return EXIT.INVALID_ARGS;
    case "NO_PINS":
      return EXIT.NO_PINS;
    case "MANIFEST_MISSING":
    case "INVALID_UTF8":
      return EXIT.MANIFEST_UNREADABLE;
    case "EXTRACT_FAILED":
    case "RESOLVE_FAILED":
    case "REWRITE_FAILED":
    case "WRITE_FAILED":
      return EXIT.PIN_FAILED;
  }
}
