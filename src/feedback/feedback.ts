/**
 * Feedback generator
 *
 * Selects a warning and suggestions for the weakest part of a scored
 * password. Only keys are chosen here; text lives in the locale tables
 * and is resolved through a Translate function.
 */

import type {
  DictionaryMatch,
  Feedback,
  Match,
  RenderedFeedback,
  Score,
  SuggestionKey,
  Translate,
  WarningKey,
} from "@/types";

const START_UPPER = /^[A-Z][^A-Z]+$/;
const ALL_UPPER = /^[^a-z]+$/;

/**
 * Score above which a password gets no warning at all.
 */
const FEEDBACK_SCORE_LIMIT = 2;

type MatchFeedback = {
  warning: WarningKey | null;
  suggestions: SuggestionKey[];
};

function dictionaryMatchFeedback(
  match: DictionaryMatch,
  isSoleMatch: boolean,
): MatchFeedback {
  let warning: WarningKey | null = null;

  switch (match.dictionaryName) {
    case "passwords":
      if (isSoleMatch && !match.l33t && !match.reversed) {
        if (match.rank <= 10) {
          warning = "topTen";
        } else if (match.rank <= 100) {
          warning = "topHundred";
        } else {
          warning = "common";
        }
      } else if (match.guessesLog10 <= 4) {
        warning = "similarToCommon";
      }
      break;
    case "english_wikipedia":
      if (isSoleMatch) {
        warning = "wordByItself";
      }
      break;
    case "surnames":
    case "male_names":
    case "female_names":
      warning = isSoleMatch ? "namesByThemselves" : "commonNames";
      break;
    default:
      break;
  }

  const suggestions: SuggestionKey[] = [];
  const word = match.token;
  if (START_UPPER.test(word)) {
    suggestions.push("capitalization");
  } else if (ALL_UPPER.test(word) && word.toLowerCase() !== word) {
    suggestions.push("allUppercase");
  }
  if (match.reversed && word.length >= 4) {
    suggestions.push("reverseWords");
  }
  if (match.l33t) {
    suggestions.push("l33t");
  }

  return { warning, suggestions };
}

/**
 * Warning and suggestions for one match, by pattern.
 */
function matchFeedback(match: Match, isSoleMatch: boolean): MatchFeedback | null {
  switch (match.pattern) {
    case "dictionary":
      return dictionaryMatchFeedback(match, isSoleMatch);
    case "spatial":
      return {
        warning: match.turns === 1 ? "straightRow" : "keyPattern",
        suggestions: ["longerKeyboardPattern"],
      };
    case "repeat":
      return {
        warning:
          match.baseToken.length === 1 ? "simpleRepeat" : "extendedRepeat",
        suggestions: ["repeated"],
      };
    case "sequence":
      return { warning: "sequences", suggestions: ["sequences"] };
    case "regex":
      return {
        warning: "recentYears",
        suggestions: ["recentYears", "associatedYears"],
      };
    case "date":
      return { warning: "dates", suggestions: ["dates"] };
    case "bruteforce":
      return null;
  }
}

/**
 * Match the feedback is about: the longest token, ties going to the
 * match with more guesses, then to the earlier one.
 */
export function dominantMatch(sequence: readonly Match[]): Match | null {
  let longest: Match | null = null;
  for (const match of sequence) {
    if (
      longest === null ||
      match.token.length > longest.token.length ||
      (match.token.length === longest.token.length &&
        match.guesses > longest.guesses)
    ) {
      longest = match;
    }
  }
  return longest;
}

/**
 * Selects feedback keys for a scored password.
 *
 * - No sequence (empty password): generic advice
 * - Score above 2: nothing to add
 * - Otherwise: feedback for the dominant match, always led by the
 *   "add another word" suggestion
 *
 * @param score - Strength score of the password
 * @param sequence - Winning match sequence
 */
export function getFeedback(score: Score, sequence: readonly Match[]): Feedback {
  const longest = dominantMatch(sequence);
  if (longest === null) {
    return { warning: null, suggestions: ["useWords", "noNeed"] };
  }
  if (score > FEEDBACK_SCORE_LIMIT) {
    return { warning: null, suggestions: [] };
  }

  const feedback = matchFeedback(longest, sequence.length === 1);
  return {
    warning: feedback?.warning ?? null,
    suggestions: ["anotherWord", ...(feedback?.suggestions ?? [])],
  };
}

/**
 * Resolves feedback keys to display text.
 *
 * @example
 * renderFeedback({ warning: "dates", suggestions: ["dates"] }, translate)
 * // { warning: "Dates are often easy to guess.", suggestions: ["Avoid dates and years that are associated with you."] }
 */
export function renderFeedback(
  feedback: Feedback,
  translate: Translate,
): RenderedFeedback {
  return {
    warning: feedback.warning ? translate(`warnings.${feedback.warning}`) : "",
    suggestions: feedback.suggestions.map((key) =>
      translate(`suggestions.${key}`),
    ),
  };
}
