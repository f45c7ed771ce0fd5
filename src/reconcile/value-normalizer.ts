const DIGIT_RUN = /\d+/;
const NON_ASCII = /[^\x00-\x7F]/;
const TRAILING_PARENTHETICAL = /\(([^()]*)\)$/;
const INTEGER_TOLERANCE = 1e-9;

export interface ModelAndStyle {
  base?: string;
  style?: string;
}

export function normalizeText(value: unknown): string | undefined {
  if (value == null) {
    return undefined;
  }

  const text = String(value).trim();
  return text ? text : undefined;
}

export function normalizeBlade(value: unknown): string | undefined {
  return normalizeText(value)?.toUpperCase();
}

export function normalizeStyle(value: unknown): string | undefined {
  return normalizeText(value)?.toUpperCase();
}

/**
 * Splits a trailing parenthetical off a model label, so "FT8 Pro (RED)" becomes
 * base "FT8 Pro" and style "RED". Full-width parentheses are accepted.
 */
export function splitModelAndStyle(raw: unknown): ModelAndStyle {
  const text = normalizeText(raw);
  if (!text) {
    return {};
  }

  const normalized = text.replace(/（/g, '(').replace(/）/g, ')');
  const match = TRAILING_PARENTHETICAL.exec(normalized);
  if (!match) {
    return { base: normalized };
  }

  const base = normalized.slice(0, match.index).trim();
  return {
    base: base || normalized,
    style: normalizeText(match[1]),
  };
}

export function parseFlex(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? roundHalfToEven(value) : undefined;
  }

  if (typeof value === 'string') {
    return firstDigitRun(value);
  }

  return undefined;
}

/** Ties go to the even neighbour: 84.5 -> 84, 85.5 -> 86. */
function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

export function isDefectAnnotated(value: unknown): boolean {
  return typeof value === 'string' && value.trim() !== '' && NON_ASCII.test(value);
}

export function parseQuantity(value: unknown, defectExclusion: boolean): number | undefined {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return undefined;
    }
    if (Number.isInteger(value)) {
      return value;
    }
    const rounded = Math.round(value);
    return Math.abs(value - rounded) < INTEGER_TOLERANCE ? rounded : Math.trunc(value);
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (!text) {
      return undefined;
    }
    if (defectExclusion && NON_ASCII.test(text)) {
      return undefined;
    }
    return firstDigitRun(text);
  }

  return undefined;
}

function firstDigitRun(text: string): number | undefined {
  const match = DIGIT_RUN.exec(text);
  return match ? Number.parseInt(match[0], 10) : undefined;
}
