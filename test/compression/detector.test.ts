/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("detects gzip from .gz and .gzip", () => {
      expect(CompressionDetector.fromExtension("sample.R1.fastq.gz")).toBe("gzip");
      expect(CompressionDetector.fromExtension("sample.R1.fastq.gzip")).toBe("gzip");
    });

    test("is case insensitive", () => {
      expect(CompressionDetector.fromExtension("GENOME.FA.GZ")).toBe("gzip");
    });

    test("handles Windows-style paths", () => {
      expect(CompressionDetector.fromExtension("C:\\data\\reads.fastq.gz")).toBe("gzip");
    });

    test("returns none for plain files", () => {
      expect(CompressionDetector.fromExtension("reference.gtf")).toBe("none");
      expect(CompressionDetector.fromExtension("archive.gz.txt")).toBe("none");
    });
  });

});
