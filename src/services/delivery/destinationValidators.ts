const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.\w+$/;
const PHONE_PATTERN = /^\+\d{10,15}$/;

export function isValidEmail(value: string | null | undefined): value is string {
  return typeof value === "string" && EMAIL_PATTERN.test(value);
}

export function isValidPhoneNumber(value: string | null | undefined): value is string {
  return typeof value === "string" && PHONE_PATTERN.test(value);
}
