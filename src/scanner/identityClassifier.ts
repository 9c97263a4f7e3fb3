function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^@/, '').toLowerCase();
}

/**
 * True only when the email provably belongs to one of the internal domains.
 * A missing email or an empty domain list is never internal: without an
 * allow-list nothing can be proven internal.
 */
export function isInternalEmail(
  email: string | null | undefined,
  internalDomains: readonly string[],
): boolean {
  if (!email || internalDomains.length === 0) return false;
  const lowered = email.toLowerCase();
  return internalDomains.some((d) => {
    const domain = normalizeDomain(d);
    return domain.length > 0 && lowered.endsWith('@' + domain);
  });
}
