/**
 * Brazilian tax ids: CPF (individuals, 11 digits) and CNPJ (companies, 14 digits).
 */

export const CPF_LENGTH = 11;
export const CNPJ_LENGTH = 14;

/**
 * Strips punctuation: "123.456.789-01" -> "12345678901"
 */
export const normalizeTaxId = (value: string): string => value.replace(/\D/g, '');

export const isValidTaxId = (digits: string): boolean =>
  /^\d+$/.test(digits) && (digits.length === CPF_LENGTH || digits.length === CNPJ_LENGTH);

/**
 * Formats a digits-only tax id for display.
 *
 * @example
 * formatTaxId('12345678901')    // '123.456.789-01'
 * formatTaxId('12345678000199') // '12.345.678/0001-99'
 * formatTaxId('123')            // '123'
 */
export const formatTaxId = (value: string): string => {
  if (/^\d{11}$/.test(value)) {
    return value.replace(/^(\d{3})(\d{3})(\d{3})(\d{2})$/, '$1.$2.$3-$4');
  }
  if (/^\d{14}$/.test(value)) {
    return value.replace(/^(\d{2})(\d{3})(\d{3})(\d{4})(\d{2})$/, '$1.$2.$3/$4-$5');
  }
  return value;
};
