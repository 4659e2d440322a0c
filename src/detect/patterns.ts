export const SENSITIVE_CATEGORIES = [
  'email',
  'phone',
  'national_id',
  'credit_card',
  'financial_account',
  'ip_address',
  'date_of_birth',
  'physical_address',
  'medical_term',
  'person_name',
  'passport',
  'transparency_context',
  'high_risk_domain',
  'prohibited_practice'
] as const;

export type SensitiveCategory = (typeof SENSITIVE_CATEGORIES)[number];

export interface CategoryMatcher {
  category: SensitiveCategory;
  pattern: RegExp;
  // Second pass over the matched text, for checks a regex cannot express
  accept?: (match: string) => boolean;
}

// Systems that talk to people directly, which carry transparency duties
const TRANSPARENCY_KEYWORDS = ['customer service', 'customer support', 'chatbot', 'virtual assistant', 'recommend(?:s|ed|ing|ations?)?'];

// Annex III style domains
const HIGH_RISK_KEYWORDS = [
  'credit score',
  'loan decision',
  'hiring',
  'employment decision',
  'employment termination',
  'medical diagnosis',
  'treatment recommendation',
  'law enforcement',
  'biometric',
  'facial recognition',
  'emotion recognition',
  'critical infrastructure',
  'educational assessment',
  'border control',
  'asylum',
  'benefits eligibility'
];

// Article 5 style practices
const PROHIBITED_KEYWORDS = [
  'social scoring',
  'mass surveillance',
  'subliminal manipulation',
  'exploit vulnerabilities',
  'real-time biometric identification'
];

const MEDICAL_TERMS = [
  'diagnos(?:is|ed|es)',
  'prognosis',
  'prescription',
  'prescribed',
  'medication',
  'dosage',
  'symptoms?',
  'chemotherapy',
  'oncology',
  'tumou?r',
  'cancer',
  'diabetes',
  'hiv',
  'hepatitis',
  'pregnan(?:t|cy)',
  'depression',
  'schizophrenia',
  'bipolar disorder',
  'blood pressure',
  'insulin',
  'allerg(?:y|ies)',
  'surgery',
  'medical record',
  'health insurance claim'
];

function keywordPattern(words: string[]): RegExp {
  const alternation = words.map((w) => w.replace(/[-\s]+/g, '[-\\s]{1,3}')).join('|');
  return new RegExp(`\\b(?:${alternation})\\b`, 'gi');
}

export function luhnValid(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '');
  if (digits.length < 13 || digits.length > 19) return false;

  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = digits.charCodeAt(i) - 48;
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}

const STREET_SUFFIX = '(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Court|Ct|Way|Place|Pl|Terrace|Square|Sq)';

export const CATEGORY_MATCHERS: readonly CategoryMatcher[] = Object.freeze([
  {
    // A match may only start where a run of local-part characters starts
    category: 'email',
    pattern: /(?<![A-Za-z0-9._%+-])[A-Za-z0-9._%+-]{1,64}@[A-Za-z0-9-]{1,63}(?:\.[A-Za-z0-9-]{1,63})*\.[A-Za-z]{2,24}\b/g
  },
  {
    // Separators required so bare integers (timestamps, token counts) are not phones
    category: 'phone',
    pattern: /(?<![\d-])(?:\+\d{1,3}[\s.-]?)?(?:\(\d{3}\)\s?|\d{3}[\s.-])\d{3}[\s.-]\d{4}(?![\d-])/g
  },
  {
    // US SSN and UK NINO
    category: 'national_id',
    pattern: /\b(?!000|666|9\d\d)\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b|\b[A-CEGHJ-PR-TW-Z]{2}\s?\d{2}\s?\d{2}\s?\d{2}\s?[A-D]\b/g
  },
  {
    category: 'credit_card',
    pattern: /\b\d(?:[ -]?\d){12,18}\b/g,
    accept: luhnValid
  },
  {
    // IBAN
    category: 'financial_account',
    pattern: /\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/g
  },
  {
    category: 'financial_account',
    pattern: /\b(?:account|acct|routing)(?:\s{1,3}(?:number|no\.?|#))?\s{0,3}[:#]?\s{0,3}\d{6,17}\b/gi
  },
  {
    category: 'ip_address',
    pattern: /\b(?:(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.){3}(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\b/g
  },
  {
    category: 'date_of_birth',
    pattern: /\b(?:dob|d\.o\.b\.|date of birth|birth ?date|born(?: on)?)\s{0,3}[:,-]?\s{0,3}(?:\d{1,2}[/.-]\d{1,2}[/.-](?:19|20)\d{2}|(?:19|20)\d{2}-\d{2}-\d{2}|[A-Za-z]{3,9}\.? \d{1,2},? (?:19|20)\d{2}|\d{1,2} [A-Za-z]{3,9} (?:19|20)\d{2})/gi
  },
  {
    category: 'physical_address',
    pattern: new RegExp(`\\b\\d{1,6}\\s{1,3}(?:[A-Z][a-z]+\\s{1,3}){1,4}${STREET_SUFFIX}\\b`, 'g')
  },
  {
    category: 'medical_term',
    pattern: new RegExp(`${keywordPattern(MEDICAL_TERMS).source}|\\b(?:NPI|MRN|DEA)[\\s:#-]?\\d{6,10}\\b`, 'gi')
  },
  {
    category: 'person_name',
    pattern: /\b(?:Mr|Mrs|Ms|Miss|Dr|Prof)\.?\s+[A-Z][a-z]+(?:\s+[A-Z][a-z]+)?\b|\b[Mm]y name is\s+[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+/g
  },
  {
    category: 'passport',
    pattern: /\bpassport(?:\s{1,3}(?:number|no\.?|#))?\s{0,3}[:#]?\s{0,3}[A-Z0-9]{6,9}\b/gi
  },
  {
    category: 'transparency_context',
    pattern: keywordPattern(TRANSPARENCY_KEYWORDS)
  },
  {
    category: 'high_risk_domain',
    pattern: keywordPattern(HIGH_RISK_KEYWORDS)
  },
  {
    category: 'prohibited_practice',
    pattern: keywordPattern(PROHIBITED_KEYWORDS)
  }
] satisfies CategoryMatcher[]);
