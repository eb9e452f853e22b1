import fs from "node:fs";
import path from "node:path";
import {describe, it, expect, beforeAll, afterAll} from "vitest";
import {FileFormat, parse, readFile, readJsonFile} from "../../../src/util/file.js";
import {getTmpDir} from "../../utils/payloads.js";

describe("util / file", () => {
  let dir: string;

  beforeAll(() => {
    dir = getTmpDir();
  });

  afterAll(() => {
    fs.rmSync(dir, {recursive: true, force: true});
  });

  it("reads every yaml scalar as a string", () => {
    expect(parse("SLOTS_PER_EPOCH: 4\nMIN_SEED_LOOKAHEAD: '1'\nENABLED: true\n", FileFormat.yaml)).toEqual({
      SLOTS_PER_EPOCH: "4",
      MIN_SEED_LOOKAHEAD: "1",
      ENABLED: "true",
    });
  });

  it("parses json", () => {
    expect(parse('{"a": [1, "2"]}', FileFormat.json)).toEqual({a: [1, "2"]});
  });

  it("picks the format from the extension", () => {
    const filepath = path.join(dir, "params.yml");
    fs.writeFileSync(filepath, "TARGET_COMMITTEE_SIZE: 2\n");
    expect(readFile(filepath)).toEqual({TARGET_COMMITTEE_SIZE: "2"});
  });

  it("rejects a format that is not accepted", () => {
    const filepath = path.join(dir, "payload.yaml");
    fs.writeFileSync(filepath, "data: []\n");
    expect(() => readFile(filepath, [FileFormat.json])).toThrow(
      `Unsupported file format: ${filepath}, expected one of json`
    );
  });

  it("rejects malformed json", () => {
    const filepath = path.join(dir, "broken.json");
    fs.writeFileSync(filepath, "{");
    expect(() => readJsonFile(filepath)).toThrow(`Invalid json file ${filepath}`);
  });

  it("rejects a missing file", () => {
    const filepath = path.join(dir, "none.json");
    expect(() => readJsonFile(filepath)).toThrow(`File not found: ${filepath}`);
  });
});
