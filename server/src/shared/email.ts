const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/i;

export const findEmail = (value?: string | null) => {
  if (!value) return null;
  const match = value.match(EMAIL_PATTERN);
  return match ? match[0].toLowerCase() : null;
};
