import type {ValueOf} from "@chainsafe/ssz";
import type * as ssz from "./sszTypes.js";

// Primitive types

export type Slot = number;
export type Epoch = number;
export type ValidatorIndex = number;
export type CommitteeIndex = number;
export type Gwei = number;
export type Bytes32 = Uint8Array;
export type BLSPubkey = Uint8Array;
export type DomainType = Uint8Array;

// Containers

export type Validator = ValueOf<typeof ssz.Validator>;
export type BeaconCommittee = ValueOf<typeof ssz.BeaconCommittee>;
export type LightBlock = ValueOf<typeof ssz.LightBlock>;
