export type ChoiceToken = "PRIMARY_A" | "PRIMARY_B" | "TAX" | "TRANSFER" | "FINISH" | "NONE";

export const allowedDiceFaces = [10, 12, 20, 25, 50, 100] as const;

export type DiceFaces = (typeof allowedDiceFaces)[number];

const primaryAPhrases = new Set([
  "a",
  "a)",
  "company",
  "company services",
  "company service",
  "company transaction",
  "company transactions",
  "services"
]);

const primaryBPhrases = new Set(["b", "b)", "loan", "loan request", "request loan", "loans"]);

const finishPhrases = new Set(["finish", "done", "report", "end", "calculate"]);

const STRICT_AMOUNT = /^([0-9,.]*\d)(\s*[km])?$/;
const EMBEDDED_NUMBER = /\d(?:[\d,.]*\d)?/;
// "uc" is the informal currency; only strip it when it is not part of a longer word.
const CURRENCY_MARKERS = /\$|(?<![a-z])uc(?![a-z])/g;

function toAmount(numeric: string): number | null {
  const value = Number(numeric.replace(/,/g, ""));
  return Number.isFinite(value) ? value : null;
}

export function parseAmount(text: string): number | null {
  const cleaned = text.trim().toLowerCase().replace(CURRENCY_MARKERS, "").trim();
  if (!cleaned) {
    return null;
  }

  const strict = STRICT_AMOUNT.exec(cleaned);
  if (strict) {
    const value = toAmount(strict[1] ?? "");
    if (value === null) {
      return null;
    }

    const suffix = strict[2]?.trim();
    if (suffix === "k") {
      return value * 1_000;
    }

    if (suffix === "m") {
      return value * 1_000_000;
    }

    return value;
  }

  const embedded = EMBEDDED_NUMBER.exec(cleaned);
  return embedded ? toAmount(embedded[0]) : null;
}

export function parseChoice(text: string): ChoiceToken {
  const normalized = text.trim().toLowerCase();

  if (primaryAPhrases.has(normalized)) {
    return "PRIMARY_A";
  }

  if (primaryBPhrases.has(normalized)) {
    return "PRIMARY_B";
  }

  if (finishPhrases.has(normalized)) {
    return "FINISH";
  }

  if (normalized.includes("tax")) {
    return "TAX";
  }

  if (normalized.includes("transfer") || normalized.includes("move")) {
    return "TRANSFER";
  }

  return "NONE";
}

export function mentions(text: string, keyword: string): boolean {
  return text.toLowerCase().includes(keyword);
}

export function isDiceFaces(value: number): value is DiceFaces {
  return allowedDiceFaces.some((faces) => faces === value);
}

export function parseDiceFaces(text: string): DiceFaces | null {
  const lowered = text.toLowerCase();

  const explicit = /d\s*([0-9]{1,3})/.exec(lowered);
  if (explicit) {
    const value = Number(explicit[1]);
    if (isDiceFaces(value)) {
      return value;
    }
  }

  const bare = new RegExp(`\\b(${allowedDiceFaces.join("|")})\\b`).exec(lowered);
  if (bare) {
    const value = Number(bare[1]);
    return isDiceFaces(value) ? value : null;
  }

  return null;
}
