const SIZE_LABELS: Record<string, string> = {
  XS: "Extra Small",
  S: "Small",
  M: "Medium",
  L: "Large",
  XL: "Extra Large",
  XXL: "Extra Extra Large"
};

const LABEL_TO_SIZE: Record<string, string> = Object.fromEntries(
  Object.entries(SIZE_LABELS).map(([abbrev, label]) => [label.toLowerCase(), abbrev])
);

/** Accepts "m", "Medium" or "M" and returns "M"; unknown sizes come back trimmed and upper-cased. */
export const normalizeSize = (size: string): string => {
  const trimmed = size.trim();
  const fromLabel = LABEL_TO_SIZE[trimmed.toLowerCase()];
  if (fromLabel) return fromLabel;
  return trimmed.toUpperCase();
};

export const sizeLabel = (size: string): string => SIZE_LABELS[size.trim().toUpperCase()] ?? size;
