import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import {YargsError} from "./errors.js";

const {load, FAILSAFE_SCHEMA, Type} = yaml;

/**
 * Every scalar is read as a string, preset files quote their numbers and the preset parser expects that
 */
export const yamlSchema = FAILSAFE_SCHEMA.extend({
  implicit: [
    new Type("tag:yaml.org,2002:str", {
      kind: "scalar",
      construct: function construct(data: string | null) {
        return data !== null ? data : "";
      },
    }),
  ],
});

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

export function isFileFormat(format: string): format is FileFormat {
  return Object.values<string>(FileFormat).includes(format);
}

/**
 * Parse file contents as Json.
 */
export function parse(contents: string, fileFormat: FileFormat): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents);
    case FileFormat.yaml:
    case FileFormat.yml:
      return load(contents, {schema: yamlSchema});
  }
}

/**
 * Read a JSON serializable object from a file
 *
 * The format is picked from the file extension, `acceptedFormats` restricts which ones are allowed
 */
export function readFile(filepath: string, acceptedFormats: FileFormat[] = Object.values(FileFormat)): unknown {
  const fileFormat = path.extname(filepath).slice(1);
  if (!isFileFormat(fileFormat) || !acceptedFormats.includes(fileFormat)) {
    throw new YargsError(`Unsupported file format: ${filepath}, expected one of ${acceptedFormats.join(", ")}`);
  }

  const contents = fs.readFileSync(filepath, "utf-8");
  try {
    return parse(contents, fileFormat);
  } catch (e) {
    throw new YargsError(`Invalid ${fileFormat} file ${filepath}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Read a JSON file that must exist, a missing file is a user error
 */
export function readJsonFile(filepath: string): unknown {
  if (!fs.existsSync(filepath)) {
    throw new YargsError(`File not found: ${filepath}`);
  }
  return readFile(filepath, [FileFormat.json]);
}
