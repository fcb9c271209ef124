export const joinComma = (strings: readonly string[]): string => {
  return strings.join(', ');
};

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value != null && typeof value === 'object' && !Array.isArray(value);
};

export const toSnakeCase = (name: string): string => {
  return name.replace(/-/g, '_');
};
