// SPDX document model and check result types
// Field names follow the SPDX 2.x JSON serialization.

export const NO_ASSERTION = "NOASSERTION";
export const NONE = "NONE";

export type LicenseValue =
  | { kind: "absent" }
  | { kind: "noassertion" }
  | { kind: "none" }
  | { kind: "expression"; expression: string };

export type ActorType = "Person" | "Organization" | "Tool";

export interface Actor {
  type: ActorType;
  name: string;
  email?: string;
}

export type SupplierValue =
  | { kind: "absent" }
  | { kind: "noassertion" }
  | { kind: "actor"; actor: Actor };

export interface CreationInfo {
  spdxVersion: string;
  spdxId: string;
  name: string;
  documentNamespace: string;
  dataLicense: string;
  created: string;         // "YYYY-MM-DDThh:mm:ssZ"
  creators: Actor[];
  licenseListVersion?: string;
  comment?: string;
}

export interface SpdxPackage {
  spdxId: string;
  name: string;
  downloadLocation: string;
  versionInfo?: string;
  supplier: SupplierValue;
  filesAnalyzed: boolean;  // SPDX default: true
  licenseConcluded: LicenseValue;
  licenseDeclared: LicenseValue;
  copyrightText?: string;  // raw text; "NOASSERTION" / "NONE" are kept verbatim
}

export interface Checksum {
  algorithm: string;
  value: string;
}

export interface SpdxFile {
  spdxId: string;
  name: string;
  checksums: Checksum[];
  licenseConcluded: LicenseValue;
  licenseInfoInFiles: string[];
  copyrightText?: string;
}

export interface Relationship {
  spdxElementId: string;
  relationshipType: string;
  relatedSpdxElementId: string;
}

export interface SpdxDocument {
  creationInfo: CreationInfo;
  packages: SpdxPackage[];
  files: SpdxFile[];
  relationships: Relationship[];
}

// --- Diagnostics ---

export type ElementType =
  | "CREATION_INFO"
  | "DOCUMENT"
  | "PACKAGE"
  | "FILE"
  | "RELATIONSHIP"
  | "LICENSE_EXPRESSION"
  | "CHECKSUM";

export interface Diagnostic {
  readonly elementType: ElementType;
  readonly spdxId?: string;
  readonly parentId?: string;
  readonly message: string;
}

export interface CheckResult {
  readonly diagnostics: readonly Diagnostic[];
  readonly parseErrors: readonly string[];
}

/** Plain key/value view of a diagnostic, suitable for JSON output. */
export interface DiagnosticRecord {
  spdx_id: string;
  parent_id: string;
  element_type: ElementType;
  message: string;
}

// --- Tagged value helpers ---

export function isLicenseAsserted(
  value: LicenseValue
): value is { kind: "expression"; expression: string } {
  return value.kind === "expression";
}

export function hasSupplier(value: SupplierValue): boolean {
  return value.kind === "actor";
}
