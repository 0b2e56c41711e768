/**
 * Normalise un nombre affiché au format italien (ou anglais) en number.
 *
 *   "1.234,56" -> 1234.56    "99,87" -> 99.87    "1.000.000" -> 1000000
 *   "3,5%"     -> 3.5        "1,234.56" -> 1234.56
 *
 * Renvoie null pour les valeurs absentes ("-", "n.d.", "", "N/A").
 */
export function parseLocaleNumber(raw: string | null | undefined): number | null {
  if (raw == null) return null;

  let value = raw
    .replace(/&nbsp;/gi, '')
    .replace(/[%€\s]/g, '')
    .replace(/^\+/, '');

  if (value === '' || /^(-+|n\.?d\.?|n\/?a|--)$/i.test(value)) {
    return null;
  }

  const lastComma = value.lastIndexOf(',');
  const lastDot = value.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    // Le dernier séparateur rencontré est le séparateur décimal
    if (lastComma > lastDot) {
      value = value.replace(/\./g, '').replace(',', '.');
    } else {
      value = value.replace(/,/g, '');
    }
  } else if (lastComma !== -1) {
    value = /^-?\d{1,3}(,\d{3}){2,}$/.test(value)
      ? value.replace(/,/g, '')
      : value.replace(',', '.');
  } else if (lastDot !== -1 && /^-?\d{1,3}(\.\d{3})+$/.test(value)) {
    // Uniquement des points groupés par 3 : séparateurs de milliers
    value = value.replace(/\./g, '');
  }

  if (!/^-?\d+(\.\d+)?$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
