export function normalizeContactEmail(email: string): string {
  return email.trim().toLowerCase();
}
