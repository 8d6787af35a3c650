/**
 * Checks regular expressions from `pattern` and `patternProperties`.
 *
 * The type language uses RE2 syntax: look-around and back-references
 * have no translation.
 */

export interface RegexScan {
  hasLookAround: boolean;
  hasBackReference: boolean;
}

export type RegexCheck =
  | { ok: true }
  | { ok: false; unsupported: boolean; message: string };

export function scanRegex(source: string): RegexScan {
  let hasLookAround = false;
  let hasBackReference = false;
  let inClass = false;
  let escapes = 0;

  for (let i = 0; i < source.length; i += 1) {
    const ch = source.charAt(i);
    const unescaped = escapes % 2 === 0;

    if (unescaped && !inClass && ch === '[') {
      inClass = true;
    } else if (unescaped && inClass && ch === ']') {
      inClass = false;
    }

    if (unescaped && !inClass && ch === '(' && source.charAt(i + 1) === '?') {
      const two = source.slice(i + 1, i + 3);
      const three = source.slice(i + 1, i + 4);
      if (two === '?=' || two === '?!' || three === '?<=' || three === '?<!') {
        hasLookAround = true;
      }
    }

    if (unescaped && !inClass && ch === '\\') {
      const next = source.charAt(i + 1);
      if (/[1-9]/.test(next) || (next === 'k' && source.charAt(i + 2) === '<')) {
        hasBackReference = true;
      }
    }

    escapes = ch === '\\' ? escapes + 1 : 0;
  }

  return { hasLookAround, hasBackReference };
}

export function checkRegex(source: string): RegexCheck {
  const quoted = JSON.stringify(source);
  const scan = scanRegex(source);
  if (scan.hasLookAround || scan.hasBackReference) {
    const what = scan.hasLookAround ? 'look-around assertion' : 'back-reference';
    return {
      ok: false,
      unsupported: true,
      message: `unsupported Perl regexp syntax in ${quoted}: ${what}`,
    };
  }
  const failure = compileError(source);
  if (failure === undefined) {
    return { ok: true };
  }
  return {
    ok: false,
    unsupported: false,
    message: `invalid regexp ${quoted}: ${failure}`,
  };
}

function compileError(source: string): string | undefined {
  try {
    new RegExp(source, 'u');
    return undefined;
  } catch (unicodeError) {
    try {
      new RegExp(source);
      return undefined;
    } catch {
      return unicodeError instanceof Error ? unicodeError.message : String(unicodeError);
    }
  }
}
