// Strips leading prose, markdown fences and trailing prose from model output.
export const normalizeLlmOutput = (raw: string): string => {
  const lines = raw.trim().split("\n");
  const start = lines.findIndex((line) => {
    const head = line.trim();
    return head.startsWith("{") || head.startsWith("```");
  });
  let text = (start >= 0 ? lines.slice(start) : lines).join("\n").trim();

  const fenced = text.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)(?:```|$)/);
  if (fenced) text = fenced[1].trim();

  const firstBrace = text.indexOf("{");
  if (firstBrace > 0) text = text.slice(firstBrace);

  const lastBrace = text.lastIndexOf("}");
  if (lastBrace > 0) text = text.slice(0, lastBrace + 1);

  return text.trim();
};

export type JsonDecodeResult = { ok: true; value: unknown } | { ok: false; error: string; text: string };

export const decodeLlmJson = (raw: string): JsonDecodeResult => {
  const text = normalizeLlmOutput(raw);
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : "invalid JSON", text };
  }
};
