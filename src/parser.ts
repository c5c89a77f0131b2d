// SPDX document parser: JSON/YAML text or plain objects into an SpdxDocument
// Structural problems are collected and reported together in one SpdxParseError.

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import {
  NO_ASSERTION,
  NONE,
  type Actor,
  type ActorType,
  type Checksum,
  type CreationInfo,
  type LicenseValue,
  type Relationship,
  type SpdxDocument,
  type SpdxFile,
  type SpdxPackage,
  type SupplierValue,
} from "./model.js";

export type DocumentFormat = "json" | "yaml";

export class SpdxParseError extends Error {
  readonly messages: string[];

  constructor(messages: string[]) {
    super(messages.join("\n"));
    this.name = "SpdxParseError";
    this.messages = messages;
  }
}

// --- Relationship types (SPDX 2.3) ---

function loadRelationshipTypes(): string[] {
  const path = new URL("../data/relationship-types.json", import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new Error(`Expected a JSON array of relationship types in ${path.pathname}`);
  }
  return raw.map(String);
}

export const RELATIONSHIP_TYPES: ReadonlySet<string> = new Set(
  loadRelationshipTypes()
);

// --- Raw value helpers ---

type RawMap = Record<string, unknown>;

function isRecord(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function asScalarString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "object") return undefined;
  return String(value);
}

class FieldReader {
  constructor(
    private readonly raw: RawMap,
    private readonly context: string,
    private readonly errors: string[]
  ) {}

  required(key: string): string {
    const value = this.raw[key];
    if (value === null || value === undefined) {
      this.errors.push(`${this.context}: required field '${key}' is missing`);
      return "";
    }
    const s = asScalarString(value);
    if (s === undefined) {
      this.errors.push(`${this.context}: field '${key}' must be a string`);
      return "";
    }
    return s;
  }

  optional(key: string): string | undefined {
    const value = this.raw[key];
    if (value === null || value === undefined) return undefined;
    const s = asScalarString(value);
    if (s === undefined) {
      this.errors.push(`${this.context}: field '${key}' must be a string`);
    }
    return s;
  }

  list(key: string): unknown[] {
    const value = this.raw[key];
    if (value === null || value === undefined) return [];
    if (!Array.isArray(value)) {
      this.errors.push(`${this.context}: field '${key}' must be a list`);
      return [];
    }
    return value;
  }

  stringList(key: string): string[] {
    const result: string[] = [];
    for (const item of this.list(key)) {
      const s = asScalarString(item);
      if (s === undefined) {
        this.errors.push(`${this.context}: entries of '${key}' must be strings`);
      } else {
        result.push(s);
      }
    }
    return result;
  }

  push(message: string): void {
    this.errors.push(`${this.context}: ${message}`);
  }
}

// --- Actors, suppliers and licenses ---

const ACTOR_PATTERN = /^(\w+):\s*(.*)$/;
const EMAIL_SUFFIX_PATTERN = /^(.*?)\s*\(([^()@]*@[^()]*|\s*)\)$/;

function toActorType(value: string | undefined): ActorType | undefined {
  switch (value) {
    case "Person":
    case "Organization":
    case "Tool":
      return value;
    default:
      return undefined;
  }
}

export function parseActor(raw: string): Actor | undefined {
  const match = ACTOR_PATTERN.exec(raw.trim());
  const type = toActorType(match?.[1]);
  if (!match || !type) return undefined;
  let name = (match[2] ?? "").trim();
  let email: string | undefined;

  const withEmail = EMAIL_SUFFIX_PATTERN.exec(name);
  if (withEmail) {
    name = (withEmail[1] ?? "").trim();
    const candidate = (withEmail[2] ?? "").trim();
    if (candidate) email = candidate;
  }
  if (!name) return undefined;
  return email ? { type, name, email } : { type, name };
}

function parseSupplier(fields: FieldReader): SupplierValue {
  const raw = fields.optional("supplier");
  if (raw === undefined || raw.trim() === "") return { kind: "absent" };
  if (raw.trim() === NO_ASSERTION) return { kind: "noassertion" };
  const actor = parseActor(raw);
  if (!actor) {
    fields.push(`invalid supplier '${raw}' (expected 'Person: ...', 'Organization: ...' or NOASSERTION)`);
    return { kind: "absent" };
  }
  return { kind: "actor", actor };
}

export function parseLicenseValue(raw: string | undefined): LicenseValue {
  const value = raw?.trim();
  if (!value) return { kind: "absent" };
  if (value === NO_ASSERTION) return { kind: "noassertion" };
  if (value === NONE) return { kind: "none" };
  return { kind: "expression", expression: value };
}

// --- Element parsers ---

function parseCreationInfo(data: RawMap, errors: string[]): CreationInfo {
  const doc = new FieldReader(data, "Document", errors);
  const spdxVersion = doc.required("spdxVersion");
  const spdxId = doc.required("SPDXID");
  const name = doc.required("name");
  const documentNamespace = doc.required("documentNamespace");
  const dataLicense = doc.required("dataLicense");

  const rawCreation = data["creationInfo"];
  if (!isRecord(rawCreation)) {
    errors.push("Document: required field 'creationInfo' is missing or not an object");
    return { spdxVersion, spdxId, name, documentNamespace, dataLicense, created: "", creators: [] };
  }

  const creation = new FieldReader(rawCreation, "CreationInfo", errors);
  const created = creation.required("created");
  const rawCreators = creation.stringList("creators");
  if (rawCreation["creators"] === undefined || rawCreation["creators"] === null) {
    creation.push("required field 'creators' is missing");
  } else if (rawCreators.length === 0) {
    creation.push("at least one creator is required");
  }
  const creators: Actor[] = [];
  for (const raw of rawCreators) {
    const actor = parseActor(raw);
    if (actor) {
      creators.push(actor);
    } else {
      creation.push(`invalid creator '${raw}'`);
    }
  }

  return {
    spdxVersion,
    spdxId,
    name,
    documentNamespace,
    dataLicense,
    created,
    creators,
    licenseListVersion: creation.optional("licenseListVersion"),
    comment: creation.optional("comment"),
  };
}

interface ParsedPackage {
  pkg: SpdxPackage;
  fileIds: string[];  // from "hasFiles"
}

function parsePackage(raw: unknown, index: number, errors: string[]): ParsedPackage | null {
  if (!isRecord(raw)) {
    errors.push(`Package #${index + 1}: must be an object`);
    return null;
  }
  const label = typeof raw["SPDXID"] === "string" ? `'${raw["SPDXID"]}'` : `#${index + 1}`;
  const fields = new FieldReader(raw, `Package ${label}`, errors);

  let filesAnalyzed = true;
  const rawAnalyzed = raw["filesAnalyzed"];
  if (typeof rawAnalyzed === "boolean") {
    filesAnalyzed = rawAnalyzed;
  } else if (rawAnalyzed !== undefined && rawAnalyzed !== null) {
    fields.push("field 'filesAnalyzed' must be a boolean");
  }

  const pkg: SpdxPackage = {
    spdxId: fields.required("SPDXID"),
    name: fields.required("name"),
    downloadLocation: fields.required("downloadLocation"),
    versionInfo: fields.optional("versionInfo"),
    supplier: parseSupplier(fields),
    filesAnalyzed,
    licenseConcluded: parseLicenseValue(fields.optional("licenseConcluded")),
    licenseDeclared: parseLicenseValue(fields.optional("licenseDeclared")),
    copyrightText: fields.optional("copyrightText"),
  };
  return { pkg, fileIds: fields.stringList("hasFiles") };
}

function parseChecksums(fields: FieldReader, raw: RawMap): Checksum[] {
  if (raw["checksums"] === undefined || raw["checksums"] === null) {
    fields.push("required field 'checksums' is missing");
    return [];
  }
  const checksums: Checksum[] = [];
  for (const entry of fields.list("checksums")) {
    if (!isRecord(entry)) {
      fields.push("checksum entries must be objects");
      continue;
    }
    const algorithm = asScalarString(entry["algorithm"]);
    const value = asScalarString(entry["checksumValue"]);
    if (!algorithm || !value) {
      fields.push("checksum entries need 'algorithm' and 'checksumValue'");
      continue;
    }
    checksums.push({ algorithm, value });
  }
  return checksums;
}

function parseFileEntry(raw: unknown, index: number, errors: string[]): SpdxFile | null {
  if (!isRecord(raw)) {
    errors.push(`File #${index + 1}: must be an object`);
    return null;
  }
  const label = typeof raw["SPDXID"] === "string" ? `'${raw["SPDXID"]}'` : `#${index + 1}`;
  const fields = new FieldReader(raw, `File ${label}`, errors);

  return {
    spdxId: fields.required("SPDXID"),
    name: fields.required("fileName"),
    checksums: parseChecksums(fields, raw),
    licenseConcluded: parseLicenseValue(fields.optional("licenseConcluded")),
    licenseInfoInFiles: fields.stringList("licenseInfoInFiles"),
    copyrightText: fields.optional("copyrightText"),
  };
}

function parseRelationship(raw: unknown, index: number, errors: string[]): Relationship | null {
  if (!isRecord(raw)) {
    errors.push(`Relationship #${index + 1}: must be an object`);
    return null;
  }
  const fields = new FieldReader(raw, `Relationship #${index + 1}`, errors);
  const relationship: Relationship = {
    spdxElementId: fields.required("spdxElementId"),
    relationshipType: fields.required("relationshipType"),
    relatedSpdxElementId: fields.required("relatedSpdxElement"),
  };
  if (relationship.relationshipType && !RELATIONSHIP_TYPES.has(relationship.relationshipType)) {
    fields.push(`invalid relationshipType '${relationship.relationshipType}'`);
  }
  return relationship;
}

// --- Public API ---

/**
 * Turn serialized document text into a plain value.
 * Throws SpdxParseError with a single message when the text is not valid JSON/YAML.
 */
export function deserialize(text: string, format: DocumentFormat = "json"): unknown {
  if (format === "yaml") {
    try {
      return yaml.load(text, { schema: yaml.CORE_SCHEMA });
    } catch (err) {
      throw new SpdxParseError([`Invalid YAML: ${errorMessage(err)}`]);
    }
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new SpdxParseError([`Invalid JSON: ${errorMessage(err)}`]);
  }
}

/**
 * Build an SpdxDocument from a deserialized SPDX JSON/YAML value.
 *
 * `documentDescribes` and package `hasFiles` entries are folded into the
 * relationship list as DESCRIBES and CONTAINS relationships.
 */
export function parseDict(data: unknown): SpdxDocument {
  if (!isRecord(data)) {
    throw new SpdxParseError(["Document: top-level value must be an object"]);
  }
  const errors: string[] = [];
  const creationInfo = parseCreationInfo(data, errors);
  const doc = new FieldReader(data, "Document", errors);

  const packages: SpdxPackage[] = [];
  const packageFiles: Array<[string, string[]]> = [];
  doc.list("packages").forEach((raw, i) => {
    const parsed = parsePackage(raw, i, errors);
    if (!parsed) return;
    packages.push(parsed.pkg);
    packageFiles.push([parsed.pkg.spdxId, parsed.fileIds]);
  });

  const files: SpdxFile[] = [];
  doc.list("files").forEach((raw, i) => {
    const file = parseFileEntry(raw, i, errors);
    if (file) files.push(file);
  });

  const relationships: Relationship[] = [];
  const seen = new Set<string>();
  const addRelationship = (rel: Relationship): void => {
    const key = `${rel.spdxElementId} ${rel.relationshipType} ${rel.relatedSpdxElementId}`;
    if (seen.has(key)) return;
    seen.add(key);
    relationships.push(rel);
  };

  doc.list("relationships").forEach((raw, i) => {
    const rel = parseRelationship(raw, i, errors);
    if (rel) addRelationship(rel);
  });
  for (const described of doc.stringList("documentDescribes")) {
    addRelationship({
      spdxElementId: creationInfo.spdxId,
      relationshipType: "DESCRIBES",
      relatedSpdxElementId: described,
    });
  }
  for (const [packageId, fileIds] of packageFiles) {
    for (const fileId of fileIds) {
      addRelationship({
        spdxElementId: packageId,
        relationshipType: "CONTAINS",
        relatedSpdxElementId: fileId,
      });
    }
  }

  if (errors.length > 0) {
    throw new SpdxParseError(errors);
  }
  return { creationInfo, packages, files, relationships };
}

export function formatForPath(filePath: string): DocumentFormat {
  const lower = filePath.toLowerCase();
  return lower.endsWith(".yaml") || lower.endsWith(".yml") ? "yaml" : "json";
}

/**
 * Parse an SPDX JSON or YAML file from disk (format chosen by extension).
 */
export function parseFile(filePath: string): SpdxDocument {
  const raw = readFileSync(filePath, "utf-8");
  return parseDict(deserialize(raw, formatForPath(filePath)));
}
