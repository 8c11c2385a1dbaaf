const PHONE_PATTERN =
  /\b(?:\+?\d{1,3}[\s.-]?)?(?:\(?\d{2,4}\)?[\s.-]?)?\d{3,4}[\s.-]?\d{4}\b/;

export const normalizePhoneDigits = (value?: string | null): string | undefined => {
  if (typeof value !== "string") return undefined;
  const digits = value.replace(/\D/g, "");
  return digits.length > 0 ? digits : undefined;
};

/** First phone-number-shaped substring, as written. */
export const findPhoneNumber = (text?: string | null): string | undefined => {
  if (!text) return undefined;
  const match = text.match(PHONE_PATTERN);
  return match ? match[0].trim() : undefined;
};

export const looksLikePhoneNumber = (value?: string | null) => {
  const digits = normalizePhoneDigits(value);
  return Boolean(digits && digits.length >= 7 && digits.length <= 15);
};
