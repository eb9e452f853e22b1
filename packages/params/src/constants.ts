// Misc

/** `2**64 - 1` on the wire, parsed as `Infinity` */
export const FAR_FUTURE_EPOCH = Infinity;
/** Upper bound of the registry, `indexCount` past this is rejected by the shuffle */
export const VALIDATOR_REGISTRY_LIMIT = 2 ** 40;
export const MAX_VALIDATORS_PER_COMMITTEE = 2048;

// Domain types

export const DOMAIN_BEACON_PROPOSER = Uint8Array.from([0, 0, 0, 0]);
export const DOMAIN_BEACON_ATTESTER = Uint8Array.from([1, 0, 0, 0]);
export const DOMAIN_RANDAO = Uint8Array.from([2, 0, 0, 0]);
export const DOMAIN_DEPOSIT = Uint8Array.from([3, 0, 0, 0]);
export const DOMAIN_VOLUNTARY_EXIT = Uint8Array.from([4, 0, 0, 0]);
export const DOMAIN_SELECTION_PROOF = Uint8Array.from([5, 0, 0, 0]);
export const DOMAIN_AGGREGATE_AND_PROOF = Uint8Array.from([6, 0, 0, 0]);

// Application specific domains

/**
 * `DOMAIN_APPLICATION_MASK` reserves the rest of the bitspace in `DomainType` for application
 * usage. This means for some `DomainType` `DOMAIN_SOME_APPLICATION`, `DOMAIN_SOME_APPLICATION
 * & DOMAIN_APPLICATION_MASK` **MUST** be non-zero.
 */
export const DOMAIN_APPLICATION_MASK = Uint8Array.from([0, 0, 0, 1]);

export enum DomainTypeName {
  beaconProposer = "beacon_proposer",
  beaconAttester = "beacon_attester",
  randao = "randao",
  deposit = "deposit",
  voluntaryExit = "voluntary_exit",
  selectionProof = "selection_proof",
  aggregateAndProof = "aggregate_and_proof",
  applicationMask = "application_mask",
}

const domainTypeValues: Record<DomainTypeName, Uint8Array> = {
  [DomainTypeName.beaconProposer]: DOMAIN_BEACON_PROPOSER,
  [DomainTypeName.beaconAttester]: DOMAIN_BEACON_ATTESTER,
  [DomainTypeName.randao]: DOMAIN_RANDAO,
  [DomainTypeName.deposit]: DOMAIN_DEPOSIT,
  [DomainTypeName.voluntaryExit]: DOMAIN_VOLUNTARY_EXIT,
  [DomainTypeName.selectionProof]: DOMAIN_SELECTION_PROOF,
  [DomainTypeName.aggregateAndProof]: DOMAIN_AGGREGATE_AND_PROOF,
  [DomainTypeName.applicationMask]: DOMAIN_APPLICATION_MASK,
};

/**
 * Return the 4 byte tag of a named domain. The returned array is shared, callers must not mutate it.
 */
export function domainTypeValue(name: DomainTypeName): Uint8Array {
  return domainTypeValues[name];
}
