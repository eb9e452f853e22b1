import {ContainerType, ListBasicType, UintNumberType} from "@chainsafe/ssz";
import type {Type} from "@chainsafe/ssz";
import {FAR_FUTURE_EPOCH} from "@randao-election/params";
import * as ssz from "./sszTypes.js";
import {BeaconCommittee, LightBlock, Validator} from "./types.js";
import {PayloadError, PayloadErrorCode} from "./errors.js";

// Parsers for the beacon API payloads the election consumes. Transport is somebody else's job, these
// only take the decoded JSON body. Every parser either returns a complete value or throws PayloadError.

export type ValidatorsResponse = {
  executionOptimistic: boolean;
  /** Registry ordered, the array position is the validator index */
  validators: Validator[];
};

export type CommitteesResponse = {
  executionOptimistic: boolean;
  committees: BeaconCommittee[];
};

/**
 * Parse a `/eth/v1/beacon/states/{state_id}/validators` response body
 */
export function parseValidatorsResponse(json: unknown): ValidatorsResponse {
  const body = getRecord(json, "$");
  const data = getArray(body.data, "$.data");

  const validators = data.map((item, position) => {
    const path = `$.data[${position}]`;
    const record = getRecord(item, path);

    // Beacon API entries wrap the validator with its index, balance and status
    if (record.validator !== undefined) {
      if (record.index !== undefined) {
        const index = parseWithType(ssz.ValidatorIndex, record.index, `${path}.index`);
        if (index !== position) {
          throw new PayloadError({code: PayloadErrorCode.INDEX_MISMATCH, position, index});
        }
      }
      return parseValidator(record.validator, `${path}.validator`);
    }

    return parseValidator(record, path);
  });

  return {executionOptimistic: getOptionalBoolean(body.execution_optimistic, "$.execution_optimistic"), validators};
}

/**
 * Parse a `/eth/v1/beacon/states/{state_id}/committees` response body
 */
export function parseCommitteesResponse(json: unknown): CommitteesResponse {
  const body = getRecord(json, "$");
  const data = getArray(body.data, "$.data");

  const committees = data.map((item, i) => {
    const path = `$.data[${i}]`;
    const committee = parseWithType(ssz.BeaconCommittee, item, path);
    assertSafeInteger(committee.index, `${path}.index`);
    assertSafeInteger(committee.slot, `${path}.slot`);
    committee.validators.forEach((validatorIndex, j) => assertSafeInteger(validatorIndex, `${path}.validators[${j}]`));
    return committee;
  });

  return {executionOptimistic: getOptionalBoolean(body.execution_optimistic, "$.execution_optimistic"), committees};
}

/**
 * Parse a `/eth/v2/beacon/blocks/{block_id}` response body of a post-merge block
 */
export function parseBlockResponse(json: unknown): LightBlock {
  const message = getRecord(getRecord(getRecord(json, "$").data, "$.data").message, "$.data.message");
  const body = getRecord(message.body, "$.data.message.body");
  const payload = getRecord(body.execution_payload, "$.data.message.body.execution_payload");

  const block = parseWithType(
    ssz.LightBlock,
    {
      slot: message.slot,
      proposer_index: message.proposer_index,
      block_number: payload.block_number,
      prev_randao: payload.prev_randao,
    },
    "$.data.message"
  );
  assertSafeInteger(block.slot, "$.data.message.slot");
  assertSafeInteger(block.proposerIndex, "$.data.message.proposer_index");
  assertSafeInteger(block.blockNumber, "$.data.message.body.execution_payload.block_number");
  return block;
}

/**
 * Parse one validator record, either from a registry file or a beacon API entry
 */
export function parseValidator(json: unknown, path = "$"): Validator {
  const validator = parseWithType(ssz.Validator, json, path);
  assertSafeInteger(validator.effectiveBalance, `${path}.effective_balance`);
  return {
    ...validator,
    activationEpoch: toEpoch(validator.activationEpoch, `${path}.activation_epoch`),
    exitEpoch: toEpoch(validator.exitEpoch, `${path}.exit_epoch`),
  };
}

/**
 * Parse a 32 bytes hex value, i.e. a RANDAO mix
 */
export function parseBytes32(json: unknown, path = "$"): Uint8Array {
  return parseWithType(ssz.Bytes32, json, path);
}

function parseWithType<T>(type: Type<T>, json: unknown, path: string): T {
  assertJsonFields(type, json, path);
  try {
    return type.fromJson(json);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason});
  }
}

/**
 * Reject malformed hex and decimal strings before handing them to ssz, which decodes invalid hex digits
 * silently and reads decimals with parseInt, i.e. `"12abc"` as 12
 */
function assertJsonFields<T>(type: Type<T>, json: unknown, path: string): void {
  if (isRecord(json)) {
    const decimalKeys = type instanceof ContainerType ? getDecimalKeys(type) : new Set<string>();
    for (const [key, value] of Object.entries(json)) {
      assertHex(value, `${path}.${key}`);
      if (decimalKeys.has(key)) {
        assertDecimal(value, `${path}.${key}`);
      }
    }
  } else {
    assertHex(json, path);
    if (type instanceof UintNumberType) {
      assertDecimal(json, path);
    }
  }
}

/**
 * JSON keys of the container fields rendered as decimal strings, or lists of them
 */
function getDecimalKeys(type: ContainerType<Record<string, Type<unknown>>>): Set<string> {
  const keys = new Set<string>();
  for (const {fieldType, jsonKey} of type.fieldsEntries) {
    if (fieldType instanceof UintNumberType || fieldType instanceof ListBasicType) {
      keys.add(jsonKey);
    }
  }
  return keys;
}

function assertDecimal(value: unknown, path: string): void {
  if (Array.isArray(value)) {
    value.forEach((item, i) => assertDecimal(item, `${path}[${i}]`));
  } else if (typeof value === "string" && !/^[0-9]+$/.test(value)) {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "invalid decimal string"});
  }
}

function assertHex(value: unknown, path: string): void {
  if (typeof value === "string" && value.startsWith("0x") && !/^0x([0-9a-fA-F]{2})*$/.test(value)) {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "invalid hex string"});
  }
}

function assertSafeInteger(value: number, path: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "expected uint64 number"});
  }
}

/**
 * Epochs past 2**53 only occur as the uint64 max sentinel, FAR_FUTURE_EPOCH
 */
function toEpoch(value: number, path: string): number {
  if (value > Number.MAX_SAFE_INTEGER) {
    return FAR_FUTURE_EPOCH;
  }
  assertSafeInteger(value, path);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "expected object"});
  }
  return value;
}

function getArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "expected array"});
  }
  return value;
}

function getOptionalBoolean(value: unknown, path: string): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw new PayloadError({code: PayloadErrorCode.INVALID_PAYLOAD, path, reason: "expected boolean"});
  }
  return value;
}
