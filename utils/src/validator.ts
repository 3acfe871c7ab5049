import { isIPv4 } from 'net';

const HOSTNAME_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;
const SECRET_REFERENCE = /^op:\/\/[^/]+\/[^/]+(?:\/[^/]+)?\/[^/]+$/;

export class Validator {
  static isIPv4(value: string): boolean {
    return isIPv4(value);
  }

  static isHostname(value: string): boolean {
    const name = value.endsWith('.') ? value.slice(0, -1) : value;
    if (name.length === 0 || name.length > 253) {
      return false;
    }
    return name.split('.').every((label) => HOSTNAME_LABEL.test(label));
  }

  /** `op://vault/item/field` or `op://vault/item/section/field` */
  static isSecretReference(value: string): boolean {
    return SECRET_REFERENCE.test(value);
  }

  static isNonNegativeInteger(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
  }
}
