// SPDX specification validator
// Generic conformance checks on a parsed document. Findings use the shared
// Diagnostic shape without the completeness marker.

import parseExpression from "spdx-expression-parse";
import {
  NO_ASSERTION,
  NONE,
  type CreationInfo,
  type Diagnostic,
  type LicenseValue,
  type SpdxDocument,
  type SpdxFile,
  type SpdxPackage,
} from "./model.js";

export const SUPPORTED_SPDX_VERSIONS: readonly string[] = Object.freeze(["SPDX-2.2", "SPDX-2.3"]);
const DOCUMENT_SPDX_ID = "SPDXRef-DOCUMENT";
const DATA_LICENSE = "CC0-1.0";

const SPDX_ID_PATTERN = /^SPDXRef-[\da-zA-Z.-]+$/;
const EXTERNAL_REF_PATTERN = /^DocumentRef-[\da-zA-Z.+-]+:SPDXRef-[\da-zA-Z.-]+$/;
const CREATED_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
const LICENSE_LIST_VERSION_PATTERN = /^\d+\.\d+$/;

export function isValidLicenseExpression(expression: string): boolean {
  try {
    parseExpression(expression);
    return true;
  } catch {
    return false;
  }
}

function isValidUri(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

// --- Creation info ---

function validateCreationInfo(info: CreationInfo): Diagnostic[] {
  const out: Diagnostic[] = [];
  const push = (message: string): void => {
    out.push({ elementType: "CREATION_INFO", spdxId: info.spdxId, message });
  };

  if (!SUPPORTED_SPDX_VERSIONS.includes(info.spdxVersion)) {
    push(
      `only SPDX versions ${SUPPORTED_SPDX_VERSIONS.map((v) => `"${v}"`).join(" and ")} ` +
        `are supported, but the document's spdx_version is: ${info.spdxVersion}`
    );
  }
  if (info.spdxId !== DOCUMENT_SPDX_ID) {
    push(`spdx_id must be "${DOCUMENT_SPDX_ID}", but is: ${info.spdxId}`);
  }
  if (info.dataLicense !== DATA_LICENSE) {
    push(`data_license must be "${DATA_LICENSE}", but is: ${info.dataLicense}`);
  }
  if (!isValidUri(info.documentNamespace)) {
    push(`document_namespace must be a valid URI, but is: ${info.documentNamespace}`);
  } else if (info.documentNamespace.includes("#")) {
    push(`document_namespace must not contain any #, but is: ${info.documentNamespace}`);
  }
  if (!CREATED_PATTERN.test(info.created)) {
    push(`created must be in the format YYYY-MM-DDThh:mm:ssZ, but is: ${info.created}`);
  }
  if (info.licenseListVersion && !LICENSE_LIST_VERSION_PATTERN.test(info.licenseListVersion)) {
    push(
      `license_list_version must be of the form "<major>.<minor>", but is: ${info.licenseListVersion}`
    );
  }
  return out;
}

// --- License expressions ---

function validateLicense(
  value: LicenseValue,
  field: string,
  elementId: string,
  parentId: string
): Diagnostic[] {
  if (value.kind !== "expression" || isValidLicenseExpression(value.expression)) {
    return [];
  }
  return [
    {
      elementType: "LICENSE_EXPRESSION",
      spdxId: elementId,
      parentId,
      message: `${field} is not a valid license expression: ${value.expression}`,
    },
  ];
}

function validateSpdxId(
  spdxId: string,
  elementType: "PACKAGE" | "FILE",
  parentId: string
): Diagnostic[] {
  if (SPDX_ID_PATTERN.test(spdxId)) return [];
  return [
    {
      elementType,
      spdxId,
      parentId,
      message: `spdx_id must only contain letters, numbers, "." and "-" and must begin with "SPDXRef-", but is: ${spdxId}`,
    },
  ];
}

// --- Packages and files ---

function validatePackage(pkg: SpdxPackage, documentId: string): Diagnostic[] {
  return [
    ...validateSpdxId(pkg.spdxId, "PACKAGE", documentId),
    ...validateLicense(pkg.licenseConcluded, "license_concluded", pkg.spdxId, documentId),
    ...validateLicense(pkg.licenseDeclared, "license_declared", pkg.spdxId, documentId),
  ];
}

function validateFile(file: SpdxFile, documentId: string): Diagnostic[] {
  const out = validateSpdxId(file.spdxId, "FILE", documentId);

  if (!file.name.startsWith("./")) {
    out.push({
      elementType: "FILE",
      spdxId: file.spdxId,
      parentId: documentId,
      message: `file name must be a relative path to the file, starting with "./", but is: ${file.name}`,
    });
  }
  if (!file.checksums.some((c) => c.algorithm === "SHA1")) {
    out.push({
      elementType: "CHECKSUM",
      spdxId: file.spdxId,
      parentId: documentId,
      message: `checksums must contain a SHA1 algorithm checksum, but only contains: [${file.checksums
        .map((c) => c.algorithm)
        .join(", ")}]`,
    });
  }
  out.push(...validateLicense(file.licenseConcluded, "license_concluded", file.spdxId, documentId));
  for (const info of file.licenseInfoInFiles) {
    if (info === NO_ASSERTION || info === NONE) continue;
    if (!isValidLicenseExpression(info)) {
      out.push({
        elementType: "LICENSE_EXPRESSION",
        spdxId: file.spdxId,
        parentId: documentId,
        message: `license_info_in_file entry is not a valid license expression: ${info}`,
      });
    }
  }
  return out;
}

// --- Relationships and document-wide checks ---

function validateRelationships(document: SpdxDocument, knownIds: Set<string>): Diagnostic[] {
  const out: Diagnostic[] = [];
  const isKnown = (id: string): boolean => knownIds.has(id) || EXTERNAL_REF_PATTERN.test(id);

  for (const rel of document.relationships) {
    const ctx = `${rel.spdxElementId} ${rel.relationshipType} ${rel.relatedSpdxElementId}`;
    if (!isKnown(rel.spdxElementId)) {
      out.push({
        elementType: "RELATIONSHIP",
        message: `did not find the referenced spdx_id ${rel.spdxElementId} in the SPDX document (relationship: ${ctx})`,
      });
    }
    const related = rel.relatedSpdxElementId;
    if (related !== NO_ASSERTION && related !== NONE && !isKnown(related)) {
      out.push({
        elementType: "RELATIONSHIP",
        message: `did not find the referenced spdx_id ${related} in the SPDX document (relationship: ${ctx})`,
      });
    }
  }
  return out;
}

/**
 * Validate a parsed document against the subset of SPDX 2.x rules this tool
 * enforces. Never throws; every problem becomes a Diagnostic.
 */
export function validateDocument(document: SpdxDocument): Diagnostic[] {
  const documentId = document.creationInfo.spdxId;
  const diagnostics: Diagnostic[] = validateCreationInfo(document.creationInfo);

  for (const pkg of document.packages) {
    diagnostics.push(...validatePackage(pkg, documentId));
  }
  for (const file of document.files) {
    diagnostics.push(...validateFile(file, documentId));
  }

  const knownIds = new Set<string>([documentId]);
  const duplicates = new Set<string>();
  for (const element of [...document.packages, ...document.files]) {
    if (knownIds.has(element.spdxId)) duplicates.add(element.spdxId);
    knownIds.add(element.spdxId);
  }

  diagnostics.push(...validateRelationships(document, knownIds));

  for (const id of duplicates) {
    diagnostics.push({
      elementType: "DOCUMENT",
      spdxId: documentId,
      message: `every spdx_id must be unique within the document, but found duplicate: ${id}`,
    });
  }

  const describes = document.relationships.some(
    (rel) =>
      (rel.spdxElementId === documentId && rel.relationshipType === "DESCRIBES") ||
      (rel.relatedSpdxElementId === documentId && rel.relationshipType === "DESCRIBED_BY")
  );
  if (!describes) {
    diagnostics.push({
      elementType: "DOCUMENT",
      spdxId: documentId,
      message: `there must be at least one relationship "${documentId} DESCRIBES ..." or "... DESCRIBED_BY ${documentId}"`,
    });
  }
  return diagnostics;
}
