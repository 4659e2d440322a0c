import { decodeText } from './detector.js';

export const RESPONSE_MARKERS = ['ai_disclosure'] as const;

export type ResponseMarker = (typeof RESPONSE_MARKERS)[number];

// Phrases a model uses when it states what it is or declines
const MARKER_PATTERNS: Readonly<Record<ResponseMarker, RegExp>> = Object.freeze({
  ai_disclosure: /\b(?:as an ai|i cannot|i can['’]t|i['’]m not able to|i am not able to)\b/i
});

// Markers are looked for in response text only; they describe what the model said
export function detectMarkers(payload: unknown): ResponseMarker[] {
  const text = decodeText(payload);
  if (!text) return [];
  return RESPONSE_MARKERS.filter((marker) => MARKER_PATTERNS[marker].test(text));
}
