import {ElectionError} from "@randao-election/utils";

export enum ShufflingErrorCode {
  /** Shuffling a zero-length list */
  EMPTY_INPUT = "SHUFFLING_ERROR_EMPTY_INPUT",
  /** Single index shuffle called with `index >= indexCount` */
  INDEX_OUT_OF_RANGE = "SHUFFLING_ERROR_INDEX_OUT_OF_RANGE",
  /** No validator is active at the epoch being shuffled */
  NO_ACTIVE_VALIDATORS = "SHUFFLING_ERROR_NO_ACTIVE_VALIDATORS",
}

export type ShufflingErrorType =
  | {code: ShufflingErrorCode.EMPTY_INPUT}
  | {code: ShufflingErrorCode.INDEX_OUT_OF_RANGE; index: number; indexCount: number}
  | {code: ShufflingErrorCode.NO_ACTIVE_VALIDATORS; epoch: number};

export class ShufflingError extends ElectionError<ShufflingErrorType> {}

export enum CommitteeErrorCode {
  SLOT_NOT_IN_EPOCH = "COMMITTEE_ERROR_SLOT_NOT_IN_EPOCH",
  COMMITTEE_INDEX_OUT_OF_RANGE = "COMMITTEE_ERROR_COMMITTEE_INDEX_OUT_OF_RANGE",
}

export type CommitteeErrorType =
  | {code: CommitteeErrorCode.SLOT_NOT_IN_EPOCH; slot: number; epoch: number}
  | {code: CommitteeErrorCode.COMMITTEE_INDEX_OUT_OF_RANGE; index: number; committeesPerSlot: number};

export class CommitteeError extends ElectionError<CommitteeErrorType> {}

export enum StateErrorCode {
  /** A RANDAO mix is not 32 bytes, or the ring length does not match the config */
  INVALID_RANDAO_MIX_LENGTH = "STATE_ERROR_INVALID_RANDAO_MIX_LENGTH",
  /** A validator exits before it activates */
  INVALID_VALIDATOR_EPOCHS = "STATE_ERROR_INVALID_VALIDATOR_EPOCHS",
}

export type StateErrorType =
  | {code: StateErrorCode.INVALID_RANDAO_MIX_LENGTH; expected: number; actual: number}
  | {code: StateErrorCode.INVALID_VALIDATOR_EPOCHS; index: number; activationEpoch: number; exitEpoch: number};

export class StateError extends ElectionError<StateErrorType> {}
