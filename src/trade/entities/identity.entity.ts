export enum Capability {
  Requester = 'Requester',
  Approver = 'Approver',
}

// Signed-in user. Capability is fixed at sign-in and never changes.
export interface Identity<C extends Capability> {
  readonly id: string;
  readonly capability: C;
}

export type Requester = Identity<Capability.Requester>;
export type Approver = Identity<Capability.Approver>;
export type AnyIdentity = Requester | Approver;

export function signIn<C extends Capability>(id: string, capability: C): Identity<C> {
  return Object.freeze({ id, capability });
}

export function requester(id: string): Requester {
  return signIn(id, Capability.Requester);
}

export function approver(id: string): Approver {
  return signIn(id, Capability.Approver);
}

export function isRequester(identity: AnyIdentity): identity is Requester {
  return identity.capability === Capability.Requester;
}

/** Equal iff both the id and the capability match */
export function sameIdentity(a: AnyIdentity, b: AnyIdentity): boolean {
  return a.id === b.id && a.capability === b.capability;
}
