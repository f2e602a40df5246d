export type ParsedResponsesOutput = {
  text: string;
  refusals: string[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toString = (value: unknown): string => (typeof value === "string" ? value : "");

const parseMessageContent = (content: unknown, acc: { textChunks: string[]; refusals: string[] }): void => {
  if (!Array.isArray(content)) return;

  for (const part of content) {
    if (!isRecord(part)) continue;
    const type = toString(part.type);

    if (type === "output_text") {
      const text = toString(part.text);
      if (text.length > 0) acc.textChunks.push(text);
      continue;
    }

    if (type === "refusal") {
      const refusal = toString(part.refusal) || toString(part.text);
      if (refusal.length > 0) acc.refusals.push(refusal);
    }
  }
};

export const parseResponsesOutput = (raw: unknown): ParsedResponsesOutput => {
  const res = isRecord(raw) ? raw : {};
  const output = Array.isArray(res.output) ? res.output : [];
  const acc = { textChunks: [] as string[], refusals: [] as string[] };

  for (const item of output) {
    if (!isRecord(item)) continue;
    const itemType = toString(item.type);

    if (itemType === "refusal") {
      const refusal = toString(item.refusal) || toString(item.text);
      if (refusal.length > 0) acc.refusals.push(refusal);
      continue;
    }

    if (itemType === "message") {
      parseMessageContent(item.content, acc);
    }
  }

  // Some gateways only fill the convenience field.
  const text = acc.textChunks.length > 0 ? acc.textChunks.join("") : toString(res.output_text);

  return {
    text,
    refusals: acc.refusals
  };
};
