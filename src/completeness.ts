// Completeness rule engine
// Checks an SPDX document for the evidence license and provenance audits need
// (suppliers, copyright text, license info) beyond what SPDX 2.x requires.

import {
  hasSupplier,
  isLicenseAsserted,
  type CreationInfo,
  type Diagnostic,
  type ElementType,
  type SpdxDocument,
  type SpdxFile,
  type SpdxPackage,
} from "./model.js";

export const COMPLETENESS_EXCEPTION = "\n*** completeness exception ***\n";
export const COMPLETENESS_SPDX_VERSIONS: readonly string[] = Object.freeze(["SPDX-2.3"]);

export function completenessDiagnostic(
  elementType: ElementType,
  message: string,
  spdxId?: string
): Diagnostic {
  const diagnostic: Diagnostic = {
    elementType,
    message: COMPLETENESS_EXCEPTION + message,
  };
  return spdxId === undefined ? diagnostic : { ...diagnostic, spdxId };
}

export function isCompletenessDiagnostic(diagnostic: Diagnostic): boolean {
  return diagnostic.message.startsWith(COMPLETENESS_EXCEPTION);
}

// --- Rule groups ---

export function checkCreationInfo(info: CreationInfo): Diagnostic[] {
  const out: Diagnostic[] = [];
  if (!COMPLETENESS_SPDX_VERSIONS.includes(info.spdxVersion)) {
    out.push(
      completenessDiagnostic(
        "CREATION_INFO",
        `The Document uses an invalid version. Valid versions include: ${COMPLETENESS_SPDX_VERSIONS.join(", ")}.`
      )
    );
  }
  if (!info.name) {
    out.push(completenessDiagnostic("CREATION_INFO", "The Document has no name."));
  }
  if (!info.licenseListVersion) {
    out.push(
      completenessDiagnostic(
        "CREATION_INFO",
        "The Document does not have a license list version."
      )
    );
  }
  return out;
}

/**
 * The first package is the primary package; exactly one DESCRIBES
 * relationship from the document must point at it. Emits at most one finding.
 */
export function checkPrimaryPackage(document: SpdxDocument): Diagnostic | null {
  const documentId = document.creationInfo.spdxId;
  const primary = document.packages[0];
  if (!primary) return null;

  const describes = document.relationships.filter(
    (rel) => rel.relationshipType === "DESCRIBES" && rel.spdxElementId === documentId
  );

  if (describes.length !== 1) {
    return completenessDiagnostic(
      "DOCUMENT",
      "This SPDX Document has an incorrect number of DESCRIBES relationships. " +
        "An SPDX document must directly describe one top-level package. " +
        `This document describes ${describes.length} packages.`
    );
  }
  if (describes[0]?.relatedSpdxElementId !== primary.spdxId) {
    return completenessDiagnostic(
      "DOCUMENT",
      "This SPDX Document's DESCRIBES relationship is to a package other than " +
        "the first in the package info section. Either the relationship is " +
        "incorrect or the top-level package that the document is describing " +
        "is not first in the packages collection."
    );
  }
  return null;
}

export function checkPackage(pkg: SpdxPackage): Diagnostic[] {
  const out: Diagnostic[] = [];
  if (!hasSupplier(pkg.supplier)) {
    out.push(
      completenessDiagnostic("PACKAGE", "This package has no supplier populated.", pkg.spdxId)
    );
  }
  if (!pkg.filesAnalyzed) {
    out.push(
      completenessDiagnostic(
        "PACKAGE",
        "The files have not been analyzed for this package.",
        pkg.spdxId
      )
    );
  }
  const licensed =
    isLicenseAsserted(pkg.licenseConcluded) || isLicenseAsserted(pkg.licenseDeclared);
  if (licensed && !pkg.copyrightText) {
    out.push(
      completenessDiagnostic(
        "PACKAGE",
        "This package has declared licenses but no copyright text populated.",
        pkg.spdxId
      )
    );
  }
  return out;
}

export function checkFile(file: SpdxFile): Diagnostic[] {
  const out: Diagnostic[] = [];
  if (!file.name) {
    out.push(completenessDiagnostic("FILE", "This file has no name.", file.spdxId));
  }

  // License evidence only matters once a license has been concluded
  if (!isLicenseAsserted(file.licenseConcluded)) return out;

  if (file.licenseInfoInFiles.length === 0) {
    out.push(
      completenessDiagnostic(
        "FILE",
        "This file has a concluded license but license_info_in_file is not populated.",
        file.spdxId
      )
    );
  }
  if (!file.copyrightText) {
    out.push(
      completenessDiagnostic(
        "FILE",
        "This file has a concluded license but no copyright text.",
        file.spdxId
      )
    );
  }
  return out;
}

// --- Stages ---

export interface StageOutcome {
  diagnostics: Diagnostic[];
  halt: boolean;
}

export interface CompletenessStage {
  id: string;
  description: string;
  run(document: SpdxDocument): StageOutcome;
}

function proceed(diagnostics: Diagnostic[]): StageOutcome {
  return { diagnostics, halt: false };
}

export const COMPLETENESS_STAGES: readonly CompletenessStage[] = [
  {
    id: "creation-info",
    description:
      "SPDX version is supported, the document has a name and a license list version.",
    run: (document) => proceed(checkCreationInfo(document.creationInfo)),
  },
  {
    id: "has-packages",
    description: "The document contains at least one package. Evaluation stops otherwise.",
    run: (document) =>
      document.packages.length > 0
        ? proceed([])
        : {
            diagnostics: [
              completenessDiagnostic("DOCUMENT", "The Document contains no packages."),
            ],
            halt: true,
          },
  },
  {
    id: "primary-package",
    description:
      "Exactly one DESCRIBES relationship from the document, targeting the first package.",
    run: (document) => {
      const finding = checkPrimaryPackage(document);
      return proceed(finding ? [finding] : []);
    },
  },
  {
    id: "packages",
    description:
      "Every package has a supplier, analyzed files, and copyright text when a license is asserted.",
    run: (document) => proceed(document.packages.flatMap(checkPackage)),
  },
  {
    id: "has-files",
    description: "The document contains at least one file. Evaluation stops otherwise.",
    run: (document) =>
      document.files.length > 0
        ? proceed([])
        : {
            diagnostics: [completenessDiagnostic("DOCUMENT", "The Document contains no files.")],
            halt: true,
          },
  },
  {
    id: "files",
    description:
      "Every file has a name; files with a concluded license have license info and copyright text.",
    run: (document) => proceed(document.files.flatMap(checkFile)),
  },
];

/**
 * Run the completeness stages in order and collect their findings.
 * A halting stage ends evaluation after its own findings are recorded.
 */
export function checkCompleteness(
  document: SpdxDocument,
  stages: readonly CompletenessStage[] = COMPLETENESS_STAGES
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const stage of stages) {
    const outcome = stage.run(document);
    diagnostics.push(...outcome.diagnostics);
    if (outcome.halt) break;
  }
  return diagnostics;
}
