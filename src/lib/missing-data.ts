const MISSING_DATA_RE =
  /not available|not found|no information|cannot find|can't find|unable to|does not contain|doesn't contain|no data|insufficient data|don't know|do not know|cannot be answered|not included|not disclosed|not reported/i;

const DEFLECTION_RE =
  /^(?:i don'?t know\.?|please )?(?:refer|see|check|consult)(?: to)? the (?:source|original|provided|underlying) (?:files?|documents?|pdfs?|materials?)\b|^i don'?t know\.?$|^n\/?a\.?$/i;

export function hasMissingDataMarker(text: string): boolean {
  return MISSING_DATA_RE.test(text);
}

/** A reply that points the user elsewhere instead of saying what is missing. */
export function isDeflection(text: string): boolean {
  const t = text.trim();
  return t.length === 0 || DEFLECTION_RE.test(t);
}

export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, " ")
    .split(/(?<=[.!?])\s+(?=[A-Z0-9"'(*])/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** First sentence carrying a missing-data marker, or undefined. */
export function missingDataSentence(text: string): string | undefined {
  return splitSentences(text).find(hasMissingDataMarker);
}
