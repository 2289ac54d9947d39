export type ParsedResponsesOutput = {
  text: string;
  refusals: string[];
};

const toString = (value: unknown): string => (typeof value === "string" ? value : "");

const asRecord = (value: unknown): Record<string, unknown> =>
  typeof value === "object" && value !== null ? Object.fromEntries(Object.entries(value)) : {};

const parseMessageContent = (content: unknown, acc: { textChunks: string[]; refusals: string[] }): void => {
  if (!Array.isArray(content)) return;

  for (const part of content) {
    const partObj = asRecord(part);
    const type = toString(partObj.type);

    if (type === "output_text") {
      const text = toString(partObj.text);
      if (text.length > 0) acc.textChunks.push(text);
      continue;
    }

    if (type === "refusal") {
      const refusal = toString(partObj.refusal) || toString(partObj.text);
      if (refusal.length > 0) acc.refusals.push(refusal);
    }
  }
};

export const parseResponsesOutput = (raw: unknown): ParsedResponsesOutput => {
  const res = asRecord(raw);
  const output = Array.isArray(res.output) ? res.output : [];
  const acc: { textChunks: string[]; refusals: string[] } = { textChunks: [], refusals: [] };

  for (const item of output) {
    const itemObj = asRecord(item);

    if (toString(itemObj.type) === "refusal") {
      const refusal = toString(itemObj.refusal) || toString(itemObj.text);
      if (refusal.length > 0) acc.refusals.push(refusal);
      continue;
    }

    parseMessageContent(itemObj.content, acc);
  }

  return {
    text: acc.textChunks.join("").trim(),
    refusals: acc.refusals
  };
};
