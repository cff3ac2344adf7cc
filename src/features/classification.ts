import { CATCH_ALL_CATEGORY, type ActionCategory } from '../types';

export interface ActionRule {
  category: Exclude<ActionCategory, 'Other'>;
  matches: (label: string) => boolean;
}

const containsIgnoringCase =
  (...needles: string[]) =>
  (label: string): boolean => {
    const lowered = label.toLowerCase();
    return needles.some((needle) => lowered.includes(needle.toLowerCase()));
  };

/** Evaluated top to bottom; the first matching rule decides the category. */
export const ACTION_RULES: readonly ActionRule[] = [
  { category: 'Open Form', matches: containsIgnoringCase('Share your story', 'Open Form') },
  { category: 'Submit', matches: containsIgnoringCase('Submit') },
  { category: 'Cancel', matches: containsIgnoringCase('Cancel') },
  { category: 'Read', matches: containsIgnoringCase('Read') },
  { category: 'Like', matches: containsIgnoringCase('like') }
];

export function classifyAction(label: string | null, rules: readonly ActionRule[] = ACTION_RULES): ActionCategory {
  if (label) {
    for (const rule of rules) {
      if (rule.matches(label)) {
        return rule.category;
      }
    }
  }
  return CATCH_ALL_CATEGORY;
}

export function isReportedCategory(category: ActionCategory): category is Exclude<ActionCategory, 'Other'> {
  return category !== CATCH_ALL_CATEGORY;
}

const LEADING_DIGITS = /^(\d+)/;

/** Leading digit run of a label such as `123 - Read more`; null when the label doesn't start with one. */
export function extractContentId(label: string | null): string | null {
  if (!label) {
    return null;
  }
  const match = LEADING_DIGITS.exec(label.trim());
  return match?.[1] ?? null;
}
