/**
 * Caller Identities
 *
 * Who a piece of work runs for. The SDK carries identities; it does not
 * authenticate them or decide permissions.
 */

export enum IdentityType {
  User = 'user',
  Service = 'service',
  Agent = 'agent',
  System = 'system'
}

export function isValidIdentityType(value: unknown): value is IdentityType {
  return Object.values(IdentityType).some((type) => type === value);
}

export interface Identity {
  readonly id: string;
  readonly type: IdentityType;
  /** Copy of the identity's claims */
  claims(): Record<string, unknown>;
  hasPermission(permission: string): boolean;
}

/**
 * Identity with fixed claims and no permissions. Authorization layers supply
 * their own {@link Identity} implementations.
 */
export class BasicIdentity implements Identity {
  readonly id: string;
  readonly type: IdentityType;
  private readonly claimSet: Readonly<Record<string, unknown>>;

  constructor(id: string, type: IdentityType, claims: Readonly<Record<string, unknown>> = {}) {
    this.id = id;
    this.type = type;
    this.claimSet = { ...claims };
  }

  claims(): Record<string, unknown> {
    return { ...this.claimSet };
  }

  hasPermission(_permission: string): boolean {
    return false;
  }
}
