const ISIN_PATTERN = /^[A-Z]{2}[A-Z0-9]{9}[0-9]$/;

// Les codes sont gardés tels quels (hors espaces) : c'est la clé du journal des ignorés
export function normalizeIsin(raw: string): string {
  return raw.trim();
}

export function sameIsin(a: string, b: string): boolean {
  return a.trim().toUpperCase() === b.trim().toUpperCase();
}

/**
 * Vérifie le format et le chiffre de contrôle (Luhn sur les chiffres,
 * lettres converties en A=10 ... Z=35).
 */
export function isValidIsin(isin: string): boolean {
  if (!ISIN_PATTERN.test(isin)) return false;

  const digits = isin
    .slice(0, 11)
    .split('')
    .map((c) => (/[A-Z]/.test(c) ? String(c.charCodeAt(0) - 55) : c))
    .join('');

  let sum = 0;
  let double = true;
  for (let i = digits.length - 1; i >= 0; i--) {
    let n = Number(digits[i]);
    if (double) {
      n *= 2;
      if (n > 9) n -= 9;
    }
    sum += n;
    double = !double;
  }

  const check = (10 - (sum % 10)) % 10;
  return check === Number(isin[11]);
}
