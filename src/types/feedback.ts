/**
 * Feedback type definitions
 *
 * The feedback generator only selects keys. Text is resolved through a
 * Translate function (see @/i18n).
 */

export type WarningKey =
  | "straightRow"
  | "keyPattern"
  | "simpleRepeat"
  | "extendedRepeat"
  | "sequences"
  | "recentYears"
  | "dates"
  | "topTen"
  | "topHundred"
  | "common"
  | "similarToCommon"
  | "wordByItself"
  | "namesByThemselves"
  | "commonNames";

export type SuggestionKey =
  | "useWords"
  | "noNeed"
  | "anotherWord"
  | "longerKeyboardPattern"
  | "repeated"
  | "sequences"
  | "recentYears"
  | "associatedYears"
  | "dates"
  | "capitalization"
  | "allUppercase"
  | "reverseWords"
  | "l33t";

export type Feedback = {
  warning: WarningKey | null;
  suggestions: SuggestionKey[];
};

/**
 * Feedback after key → text resolution. A missing warning renders as "".
 */
export type RenderedFeedback = {
  warning: string;
  suggestions: string[];
};
