import { genderFromTokens, type Gender } from "../../utils/gender.js";
import { hasAnyToken, tokenSet } from "../../utils/text.js";
import type { MessageClass } from "./schema.js";

export const SIZE_KEYWORDS: readonly string[] = [
  "size",
  "sizes",
  "sizing",
  "stock",
  "available",
  "availability",
  "inventory",
  "fit",
  "fits",
  "instock"
];

export const PRODUCT_KEYWORDS: readonly string[] = [
  "find",
  "show",
  "want",
  "looking",
  "browse",
  "clothing",
  "clothes",
  "fashion",
  "apparel",
  "wear",
  "shirt",
  "shirts",
  "tshirt",
  "top",
  "tops",
  "blouse",
  "tee",
  "dress",
  "dresses",
  "gown",
  "frock",
  "pants",
  "trousers",
  "jeans",
  "shorts",
  "skirt",
  "jacket",
  "branded",
  "designer",
  "premium"
];

const GREETING_KEYWORDS: readonly string[] = ["hi", "hello", "hey", "thanks", "thank", "morning", "evening", "afternoon", "howdy"];

const GREETING_PHRASES: readonly string[] = ["how are you", "how's your day", "what's up", "good morning", "good evening"];

const ACCOUNT_KEYWORDS: readonly string[] = [
  "order",
  "orders",
  "price",
  "discount",
  "discounts",
  "offer",
  "offers",
  "cart",
  "pay",
  "payment",
  "delivery",
  "shipping",
  "pickup",
  "buy",
  "recommend",
  "call",
  "name"
];

const ID_PATTERN = /\b(?:prod|sku)-\w+/i;

export const hasSizeSignal = (tokens: ReadonlySet<string>): boolean => hasAnyToken(tokens, SIZE_KEYWORDS);

export const hasProductSignal = (tokens: ReadonlySet<string>): boolean => hasAnyToken(tokens, PRODUCT_KEYWORDS);

export const inferGender = (tokens: ReadonlySet<string>): Gender | undefined => genderFromTokens(tokens);

export const inferCategory = (tokens: ReadonlySet<string>): string => {
  const gender = inferGender(tokens);
  if (gender === "female") return "Women's Fashion";
  if (gender === "male") return "Men's Fashion";
  return "Fashion";
};

export const hasGreetingSignal = (tokens: ReadonlySet<string>, message: string): boolean => {
  const lowered = message.toLowerCase();
  return hasAnyToken(tokens, GREETING_KEYWORDS) || GREETING_PHRASES.some((phrase) => lowered.includes(phrase));
};

export const mentionsCatalogIds = (message: string): boolean => ID_PATTERN.test(message);

/**
 * Best-effort: a greeting with no task signal is small talk, a greeting mixed with
 * one is ambiguous, everything else is a task. Ambiguous messages are run as tasks.
 */
export const classifyMessage = (message: string): MessageClass => {
  const tokens = tokenSet(message);
  const greeting = hasGreetingSignal(tokens, message);
  if (!greeting) return "task";
  const taskSignal =
    hasProductSignal(tokens) || hasSizeSignal(tokens) || hasAnyToken(tokens, ACCOUNT_KEYWORDS) || mentionsCatalogIds(message);
  return taskSignal ? "ambiguous" : "small_talk";
};
