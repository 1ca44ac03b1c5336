/** Reads a single urlencoded form value; repeated or missing fields read as ''. */
export const formField = (body: unknown, key: string): string => {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : '';
};

export const queryText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

/** Accepts only same-site absolute paths as post-login targets. */
export const safeRedirectTarget = (value: unknown): string | undefined => {
  if (typeof value !== 'string' || !value.startsWith('/')) return undefined;
  if (value.startsWith('//') || value.startsWith('/\\')) return undefined;
  return value;
};

export const parseRecordId = (value: string | undefined): number | undefined => {
  if (!value || !/^\d+$/.test(value)) return undefined;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
};
