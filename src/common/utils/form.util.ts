/** Multipart and form fields arrive as strings. */
export function toBoolean({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}
