const SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export const shellQuote = (value: string): string => {
  if (value !== "" && SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
};
