type TranslationNode = Record<string, unknown>;

export type TranslationLeaf = {
  key: string;
  value: string;
  /** Set when the JSON value was not a string; `value` then holds its JSON text. */
  literal: boolean;
};

export const isPlainObject = (value: unknown): value is TranslationNode =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Flattens nested translation objects into dotted keys, in document order.
 * Every leaf is returned, so two paths that join to the same key both appear.
 */
export const flattenObject = (obj: TranslationNode): TranslationLeaf[] => {
  const leaves: TranslationLeaf[] = [];

  const visit = (node: TranslationNode, path: string): void => {
    for (const [key, value] of Object.entries(node)) {
      const nextPath = path ? `${path}.${key}` : key;

      if (isPlainObject(value)) {
        visit(value, nextPath);
        continue;
      }

      if (typeof value === "string") {
        leaves.push({ key: nextPath, value, literal: false });
        continue;
      }

      if (value !== undefined) {
        leaves.push({ key: nextPath, value: JSON.stringify(value), literal: true });
      }
    }
  };

  visit(obj, "");
  return leaves;
};
