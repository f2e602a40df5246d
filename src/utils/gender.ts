import { hasAnyToken, tokenSet } from "./text.js";

export type Gender = "female" | "male";

export const FEMALE_KEYWORDS: readonly string[] = ["female", "women", "womens", "woman", "ladies", "lady", "girl", "girls"];
export const MALE_KEYWORDS: readonly string[] = ["male", "men", "mens", "man", "guys", "boy", "boys"];

/** Female keywords win when both appear. */
export const genderFromTokens = (tokens: ReadonlySet<string>): Gender | undefined => {
  if (hasAnyToken(tokens, FEMALE_KEYWORDS)) return "female";
  if (hasAnyToken(tokens, MALE_KEYWORDS)) return "male";
  return undefined;
};

export const normalizeGender = (value: string): Gender | undefined => genderFromTokens(tokenSet(value));
