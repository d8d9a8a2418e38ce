/**
 * Certificate validation name.
 *
 * The peer certificate is checked against the registrable-looking tail of the host
 * ("second dot-group"): `gateway.example.com` is validated as `example.com`.
 */

import { isIP } from 'node:net';
import { Brand } from 'effect';

export type ValidationName = string & Brand.Brand<'ValidationName'>;
export const ValidationName = Brand.nominal<ValidationName>();

export const stripBrackets = (host: string): string =>
  host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;

const secondDotFromRight = (host: string): number => {
  const last = host.lastIndexOf('.');
  return last <= 0 ? -1 : host.lastIndexOf('.', last - 1);
};

/**
 * Everything after the second '.' from the right. Hosts with fewer than two dots, or whose
 * second dot from the right is the leading character, are kept whole. IP literals are
 * kept whole as well.
 */
export const deriveValidationName = (
  host: string | undefined,
  fallback: string
): ValidationName => {
  const bare = host ? stripBrackets(host) : '';
  const dot = secondDotFromRight(bare);

  return ValidationName(
    bare === '' ? fallback : isIP(bare) !== 0 || dot <= 0 ? bare : bare.slice(dot + 1)
  );
};
