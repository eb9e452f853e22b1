import {ByteVectorType, ContainerType, ListBasicType, UintNumberType} from "@chainsafe/ssz";
import {MAX_VALIDATORS_PER_COMMITTEE} from "@randao-election/params";

// Primitive types

export const UintNum64 = new UintNumberType(8);
/** uint64 whose max value (FAR_FUTURE_EPOCH) is represented as Infinity */
export const UintNumInf64 = new UintNumberType(8, {clipInfinity: true});
export const Bytes32 = new ByteVectorType(32);
export const Bytes48 = new ByteVectorType(48);

export const Slot = UintNum64;
export const Epoch = UintNumInf64;
export const ValidatorIndex = UintNum64;
export const CommitteeIndex = UintNum64;
export const Gwei = UintNum64;
export const BLSPubkey = Bytes48;

// Containers

/**
 * The registry fields committee election reads. The beacon API renders the full phase0 Validator,
 * extra fields are ignored when parsing.
 */
export const Validator = new ContainerType(
  {
    pubkey: BLSPubkey,
    effectiveBalance: Gwei,
    activationEpoch: Epoch,
    exitEpoch: Epoch,
  },
  {typeName: "Validator", jsonCase: "eth2"}
);

export const CommitteeValidators = new ListBasicType(ValidatorIndex, MAX_VALIDATORS_PER_COMMITTEE);

/** One entry of the beacon API committees response */
export const BeaconCommittee = new ContainerType(
  {
    index: CommitteeIndex,
    slot: Slot,
    validators: CommitteeValidators,
  },
  {typeName: "BeaconCommittee", jsonCase: "eth2"}
);

/** The block fields needed to seed the RANDAO ring */
export const LightBlock = new ContainerType(
  {
    slot: Slot,
    proposerIndex: ValidatorIndex,
    blockNumber: UintNum64,
    prevRandao: Bytes32,
  },
  {typeName: "LightBlock", jsonCase: "eth2"}
);
