import { describe, it, expect } from "vitest";
import { isValidLicenseExpression, validateDocument } from "../src/validator.js";
import type { SpdxDocument, SpdxFile, SpdxPackage } from "../src/model.js";

function makePackage(overrides: Partial<SpdxPackage> = {}): SpdxPackage {
  return {
    spdxId: "SPDXRef-Package-a",
    name: "a",
    downloadLocation: "NOASSERTION",
    supplier: { kind: "noassertion" },
    filesAnalyzed: true,
    licenseConcluded: { kind: "expression", expression: "MIT" },
    licenseDeclared: { kind: "noassertion" },
    ...overrides,
  };
}

function makeFile(overrides: Partial<SpdxFile> = {}): SpdxFile {
  return {
    spdxId: "SPDXRef-File-a",
    name: "./a.c",
    checksums: [{ algorithm: "SHA1", value: "abc123" }],
    licenseConcluded: { kind: "expression", expression: "MIT" },
    licenseInfoInFiles: ["MIT"],
    ...overrides,
  };
}

function makeDocument(overrides: Partial<SpdxDocument> = {}): SpdxDocument {
  return {
    creationInfo: {
      spdxVersion: "SPDX-2.3",
      spdxId: "SPDXRef-DOCUMENT",
      name: "doc",
      documentNamespace: "https://example.com/doc",
      dataLicense: "CC0-1.0",
      created: "2024-01-01T00:00:00Z",
      creators: [{ type: "Tool", name: "generator" }],
    },
    packages: [makePackage()],
    files: [makeFile()],
    relationships: [
      {
        spdxElementId: "SPDXRef-DOCUMENT",
        relationshipType: "DESCRIBES",
        relatedSpdxElementId: "SPDXRef-Package-a",
      },
    ],
    ...overrides,
  };
}

describe("isValidLicenseExpression", () => {
  it("accepts listed identifiers, compound expressions and license refs", () => {
    expect(isValidLicenseExpression("MIT")).toBe(true);
    expect(isValidLicenseExpression("MIT OR Apache-2.0")).toBe(true);
    expect(isValidLicenseExpression("LicenseRef-custom")).toBe(true);
  });

  it("rejects malformed expressions", () => {
    expect(isValidLicenseExpression("MIT AND (")).toBe(false);
    expect(isValidLicenseExpression("not a license")).toBe(false);
  });
});

describe("validateDocument", () => {
  it("accepts a conforming document", () => {
    expect(validateDocument(makeDocument())).toEqual([]);
  });

  it("never adds the completeness marker", () => {
    const doc = makeDocument({ relationships: [] });
    const found = validateDocument(doc);
    expect(found).toHaveLength(1);
    expect(found[0].message.includes("completeness exception")).toBe(false);
  });

  it("reports unsupported SPDX versions", () => {
    const doc = makeDocument();
    doc.creationInfo.spdxVersion = "SPDX-2.1";
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "CREATION_INFO",
        spdxId: "SPDXRef-DOCUMENT",
        message:
          'only SPDX versions "SPDX-2.2" and "SPDX-2.3" are supported, ' +
          "but the document's spdx_version is: SPDX-2.1",
      },
    ]);
  });

  it("accepts SPDX-2.2 documents", () => {
    const doc = makeDocument();
    doc.creationInfo.spdxVersion = "SPDX-2.2";
    expect(validateDocument(doc)).toEqual([]);
  });

  it("checks namespace, creation time and license list version", () => {
    const doc = makeDocument();
    doc.creationInfo.documentNamespace = "https://example.com/doc#1";
    doc.creationInfo.created = "2024-01-01";
    doc.creationInfo.licenseListVersion = "v3";
    expect(validateDocument(doc).map((d) => d.message)).toEqual([
      "document_namespace must not contain any #, but is: https://example.com/doc#1",
      "created must be in the format YYYY-MM-DDThh:mm:ssZ, but is: 2024-01-01",
      'license_list_version must be of the form "<major>.<minor>", but is: v3',
    ]);
  });

  it("rejects namespaces that are not URIs", () => {
    const doc = makeDocument();
    doc.creationInfo.documentNamespace = "not a uri";
    expect(validateDocument(doc).map((d) => d.message)).toEqual([
      "document_namespace must be a valid URI, but is: not a uri",
    ]);
  });

  it("reports invalid package license expressions with the document as parent", () => {
    const doc = makeDocument({
      packages: [makePackage({ licenseConcluded: { kind: "expression", expression: "MIT AND (" } })],
    });
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "LICENSE_EXPRESSION",
        spdxId: "SPDXRef-Package-a",
        parentId: "SPDXRef-DOCUMENT",
        message: "license_concluded is not a valid license expression: MIT AND (",
      },
    ]);
  });

  it("checks file names, checksums and license info entries", () => {
    const doc = makeDocument({
      files: [
        makeFile({
          name: "a.c",
          checksums: [{ algorithm: "SHA256", value: "abc123" }],
          licenseInfoInFiles: ["NOASSERTION", "MIT", "bogus ("],
        }),
      ],
    });
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "FILE",
        spdxId: "SPDXRef-File-a",
        parentId: "SPDXRef-DOCUMENT",
        message: 'file name must be a relative path to the file, starting with "./", but is: a.c',
      },
      {
        elementType: "CHECKSUM",
        spdxId: "SPDXRef-File-a",
        parentId: "SPDXRef-DOCUMENT",
        message: "checksums must contain a SHA1 algorithm checksum, but only contains: [SHA256]",
      },
      {
        elementType: "LICENSE_EXPRESSION",
        spdxId: "SPDXRef-File-a",
        parentId: "SPDXRef-DOCUMENT",
        message: "license_info_in_file entry is not a valid license expression: bogus (",
      },
    ]);
  });

  it("reports malformed element ids", () => {
    const doc = makeDocument({
      packages: [makePackage()],
      files: [makeFile({ spdxId: "File_a" })],
    });
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "FILE",
        spdxId: "File_a",
        parentId: "SPDXRef-DOCUMENT",
        message:
          'spdx_id must only contain letters, numbers, "." and "-" and must begin with "SPDXRef-", but is: File_a',
      },
    ]);
  });

  it("reports relationships to unknown elements", () => {
    const doc = makeDocument();
    doc.relationships.push(
      {
        spdxElementId: "SPDXRef-Package-a",
        relationshipType: "DEPENDS_ON",
        relatedSpdxElementId: "SPDXRef-Missing",
      },
      {
        spdxElementId: "SPDXRef-Package-a",
        relationshipType: "DEPENDS_ON",
        relatedSpdxElementId: "DocumentRef-other:SPDXRef-lib",
      },
      {
        spdxElementId: "SPDXRef-Package-a",
        relationshipType: "DEPENDS_ON",
        relatedSpdxElementId: "NOASSERTION",
      }
    );
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "RELATIONSHIP",
        message:
          "did not find the referenced spdx_id SPDXRef-Missing in the SPDX document " +
          "(relationship: SPDXRef-Package-a DEPENDS_ON SPDXRef-Missing)",
      },
    ]);
  });

  it("reports duplicate element ids", () => {
    const doc = makeDocument({ packages: [makePackage(), makePackage()] });
    expect(validateDocument(doc)).toEqual([
      {
        elementType: "DOCUMENT",
        spdxId: "SPDXRef-DOCUMENT",
        message: "every spdx_id must be unique within the document, but found duplicate: SPDXRef-Package-a",
      },
    ]);
  });

  it("requires the document to describe something", () => {
    expect(validateDocument(makeDocument({ relationships: [] }))).toEqual([
      {
        elementType: "DOCUMENT",
        spdxId: "SPDXRef-DOCUMENT",
        message:
          'there must be at least one relationship "SPDXRef-DOCUMENT DESCRIBES ..." ' +
          'or "... DESCRIBED_BY SPDXRef-DOCUMENT"',
      },
    ]);
  });

  it("accepts a DESCRIBED_BY relationship in place of DESCRIBES", () => {
    const doc = makeDocument({
      relationships: [
        {
          spdxElementId: "SPDXRef-Package-a",
          relationshipType: "DESCRIBED_BY",
          relatedSpdxElementId: "SPDXRef-DOCUMENT",
        },
      ],
    });
    expect(validateDocument(doc)).toEqual([]);
  });
});
