import { describe, expect, test } from "vitest";
import { classifyMessage, hasProductSignal, hasSizeSignal, inferCategory, inferGender } from "../src/agent/plan/intent.js";
import { normalizeGender } from "../src/utils/gender.js";
import { normalizeSize, sizeLabel } from "../src/utils/size.js";
import { tokenSet, tokenize } from "../src/utils/text.js";

describe("message signals", () => {
  test("tokenize splits on apostrophes and punctuation", () => {
    expect(tokenize("Women's T-Shirts, size M!")).toEqual(["women", "s", "t", "shirts", "size", "m"]);
  });

  test("size and product signals", () => {
    expect(hasSizeSignal(tokenSet("Is this available in medium?"))).toBe(true);
    expect(hasSizeSignal(tokenSet("show me dresses"))).toBe(false);
    expect(hasProductSignal(tokenSet("show me dresses"))).toBe(true);
    expect(hasProductSignal(tokenSet("what is my order status"))).toBe(false);
  });

  test("female wins when both genders appear", () => {
    expect(inferGender(tokenSet("shirts for men and women"))).toBe("female");
    expect(inferGender(tokenSet("shirts for men"))).toBe("male");
    expect(inferGender(tokenSet("shirts"))).toBeUndefined();
  });

  test("category follows gender", () => {
    expect(inferCategory(tokenSet("find me female clothing"))).toBe("Women's Fashion");
    expect(inferCategory(tokenSet("jackets for guys"))).toBe("Men's Fashion");
    expect(inferCategory(tokenSet("a nice jacket"))).toBe("Fashion");
  });

  test("normalizers", () => {
    expect(normalizeGender("Men's Fashion")).toBe("male");
    expect(normalizeGender("Women's Fashion")).toBe("female");
    expect(normalizeGender("unisex")).toBeUndefined();
    expect(normalizeSize(" medium ")).toBe("M");
    expect(normalizeSize("xl")).toBe("XL");
    expect(normalizeSize("One Size")).toBe("ONE SIZE");
    expect(sizeLabel("s")).toBe("Small");
  });
});

describe("classifyMessage", () => {
  test("plain greetings are small talk", () => {
    expect(classifyMessage("hi there")).toBe("small_talk");
    expect(classifyMessage("Good morning!")).toBe("small_talk");
    expect(classifyMessage("how are you today")).toBe("small_talk");
  });

  test("greetings with a task signal are ambiguous", () => {
    expect(classifyMessage("hello, do you have jeans in stock?")).toBe("ambiguous");
    expect(classifyMessage("thanks, what about PROD-001?")).toBe("ambiguous");
    expect(classifyMessage("hey, what's the status of my order")).toBe("ambiguous");
  });

  test("anything without a greeting is a task", () => {
    expect(classifyMessage("show me jeans")).toBe("task");
    expect(classifyMessage("call me Sam")).toBe("task");
  });
});
