/**
 * Country identifier normalization, applied identically to the boundary
 * layer and to every tabular dataset before joining.
 */

/**
 * Codes Our World in Data assigns where ISO 3166 has none, mapped to the
 * Natural Earth ADM0_A3 code of the same territory
 */
const OWID_CODE_ALIASES: Readonly<Record<string, string>> = {
  OWID_KOS: 'KOS',
  OWID_CYN: 'CYN',
};

export function normalizeCountryId(value: string): string {
  const normalized = value.trim().toUpperCase();
  return OWID_CODE_ALIASES[normalized] ?? normalized;
}
