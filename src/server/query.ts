export type QueryString = Record<string, string | string[] | undefined>;

/** First value of a query parameter; repeated parameters arrive as arrays. */
export function firstString(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
