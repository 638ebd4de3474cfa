/** Split on commas and whitespace, dropping empty words. */
export function splitValue(value: string): string[] {
  return value.split(/[,\s]+/).filter((word) => word.length > 0);
}

export function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter((word) => word.length > 0).join(' ');
}
