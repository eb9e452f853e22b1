import {ElectionError} from "@randao-election/utils";

export enum PayloadErrorCode {
  /** A field is missing or does not hold a value of the expected type */
  INVALID_PAYLOAD = "PAYLOAD_ERROR_INVALID_PAYLOAD",
  /** The `index` of a validator record does not match its registry position */
  INDEX_MISMATCH = "PAYLOAD_ERROR_INDEX_MISMATCH",
}

export type PayloadErrorType =
  | {code: PayloadErrorCode.INVALID_PAYLOAD; path: string; reason: string}
  | {code: PayloadErrorCode.INDEX_MISMATCH; position: number; index: number};

export class PayloadError extends ElectionError<PayloadErrorType> {}
