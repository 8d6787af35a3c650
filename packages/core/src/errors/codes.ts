/**
 * Stable error codes and the CLI exit codes they map to.
 */

export type Severity = 'info' | 'warn' | 'error';

// Grouped by domain
export enum ErrorCode {
  // Schema structure (E001–E099)
  INVALID_KEYWORD_VALUE = 'E001',
  UNSATISFIABLE_SCHEMA = 'E002',
  DUPLICATE_DEFINITION = 'E003',
  INVALID_REGEX = 'E004',
  INVALID_VALUE = 'E005',

  // References (E100–E199)
  INVALID_REFERENCE = 'E100',
  UNRESOLVED_REFERENCE = 'E101',
  EXTERNAL_REFERENCE = 'E102',

  // Versions and features (E200–E299)
  UNKNOWN_KEYWORD = 'E200',
  KEYWORD_VERSION_MISMATCH = 'E201',
  UNSUPPORTED_FEATURE = 'E202',
  UNKNOWN_SCHEMA_VERSION = 'E203',
  UNKNOWN_FORMAT = 'E204',

  // Generation (E300–E399)
  GENERATION_FAILED = 'E300',
  UNSUPPORTED_TARGET_VERSION = 'E301',

  // Configuration (E400–E499)
  CONFIGURATION_ERROR = 'E400',

  // Internal (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.INVALID_KEYWORD_VALUE]: 10,
  [ErrorCode.UNSATISFIABLE_SCHEMA]: 11,
  [ErrorCode.DUPLICATE_DEFINITION]: 12,
  [ErrorCode.INVALID_REGEX]: 13,
  [ErrorCode.INVALID_VALUE]: 14,
  [ErrorCode.INVALID_REFERENCE]: 20,
  [ErrorCode.UNRESOLVED_REFERENCE]: 21,
  [ErrorCode.EXTERNAL_REFERENCE]: 22,
  [ErrorCode.UNKNOWN_KEYWORD]: 30,
  [ErrorCode.KEYWORD_VERSION_MISMATCH]: 31,
  [ErrorCode.UNSUPPORTED_FEATURE]: 32,
  [ErrorCode.UNKNOWN_SCHEMA_VERSION]: 33,
  [ErrorCode.UNKNOWN_FORMAT]: 34,
  [ErrorCode.GENERATION_FAILED]: 40,
  [ErrorCode.UNSUPPORTED_TARGET_VERSION]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
