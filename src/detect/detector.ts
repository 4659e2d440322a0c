import { CATEGORY_MATCHERS, SENSITIVE_CATEGORIES, type SensitiveCategory } from './patterns.js';

export interface CategorySpan {
  category: SensitiveCategory;
  offset: number;
  length: number;
}

// Category names and positions only; matched values never leave this module
export interface DetectionReport {
  categories: SensitiveCategory[];
  spans: CategorySpan[];
}

function emptyReport(): DetectionReport {
  return { categories: [], spans: [] };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeText(payload: unknown): string | null {
  if (typeof payload === 'string') {
    return payload.includes('\u0000') ? null : payload;
  }
  if (payload instanceof Uint8Array) {
    try {
      const text = utf8.decode(payload);
      return text.includes('\u0000') ? null : text;
    } catch {
      return null;
    }
  }
  return null;
}

export function detectCategories(payload: unknown): DetectionReport {
  const text = decodeText(payload);
  if (!text) return emptyReport();

  const found = new Set<SensitiveCategory>();
  const spans: CategorySpan[] = [];

  for (const matcher of CATEGORY_MATCHERS) {
    for (const match of text.matchAll(matcher.pattern)) {
      if (matcher.accept && !matcher.accept(match[0])) continue;
      found.add(matcher.category);
      spans.push({ category: matcher.category, offset: match.index ?? 0, length: match[0].length });
    }
  }

  if (found.size === 0) return emptyReport();

  return {
    categories: SENSITIVE_CATEGORIES.filter((c) => found.has(c)),
    spans: spans.sort((a, b) => a.offset - b.offset)
  };
}

// Union of several reports, e.g. request and response of one call
export function mergeReports(...reports: DetectionReport[]): DetectionReport {
  const found = new Set<SensitiveCategory>();
  const spans: CategorySpan[] = [];
  for (const report of reports) {
    report.categories.forEach((c) => found.add(c));
    spans.push(...report.spans);
  }
  if (found.size === 0) return emptyReport();
  return { categories: SENSITIVE_CATEGORIES.filter((c) => found.has(c)), spans };
}
