import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { ChromMismatchError, FileError, ParseError, ValidationError } from "../../../src/errors";
import { GffFeature } from "../../../src/formats/gff/feature";
import { GffReader } from "../../../src/formats/gff/reader";
import type { GffRecord } from "../../../src/formats/gff/types";
import { captureError, collect, gffLine, sizeOfLines } from "../../utils/gff-fixtures";

const quiet = { onWarning: () => {} };

function streamOfBytes(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

function features(records: readonly GffRecord[]): GffFeature[] {
  return records.filter((record): record is GffFeature => record instanceof GffFeature);
}

const gtfLines = [
  gffLine("chr1", "src", "exon", "100", "200", ".", "+", ".", 'gene_id "G1"; transcript_id "T1";'),
  gffLine("chr1", "src", "exon", "300", "400", ".", "+", ".", 'gene_id "G1"; transcript_id "T1";'),
  gffLine("chr1", "src", "exon", "500", "600", ".", "+", ".", 'gene_id "G1"; transcript_id "T1";'),
  gffLine("chr1", "src", "exon", "700", "800", ".", "-", ".", 'gene_id "G2"; transcript_id "T2";'),
];
const gtfData = `${gtfLines.join("\n")}\n`;

const gff3Lines = [
  "##gff-version 3",
  gffLine("chr1", "src", "gene", "1000", "9000", ".", "+", ".", "ID=gene1;Name=alpha"),
  gffLine("chr1", "src", "mRNA", "1050", "9000", ".", "+", ".", "ID=mrna1;Parent=gene1"),
  gffLine("chr1", "src", "ncRNA", "1200", "1300", ".", "+", ".", "ID=nc1;Parent=gene1"),
  gffLine("chr1", "src", "gene", "20000", "21000", ".", "-", ".", "ID=gene2"),
  gffLine("chr2", "src", "gene", "5", "50", ".", "+", ".", "ID=gene3"),
];
const gff3Data = `${gff3Lines.join("\n")}\n`;

describe("GffReader", () => {
  describe("grouping", () => {
    test("groups GTF lines by transcript_id", async () => {
      const records = await collect(new GffReader().parseString(gtfData));

      expect(records).toHaveLength(2);
      const [first, second] = features(records);
      expect(first?.name()).toBe("G1");
      expect(first?.intervals).toHaveLength(3);
      expect(first).toMatchObject({ chrom: "chr1", start: 100, end: 600, strand: "+" });
      expect(first?.rawSize).toBe(sizeOfLines(gtfLines.slice(0, 3)));

      expect(second?.name()).toBe("G2");
      expect(second?.intervals).toHaveLength(1);
      expect(second).toMatchObject({ start: 700, end: 800, strand: "-" });
      expect(second?.rawSize).toBe(sizeOfLines(gtfLines.slice(3)));
    });

    test("groups GFF3 children under their parent ID", async () => {
      const records = await collect(new GffReader().parseString(gff3Data));

      expect(records.map((record) => record.kind)).toEqual(["header", "feature", "feature", "feature"]);
      expect(records[0]).toEqual({
        kind: "header",
        rawText: "##gff-version 3",
        rawSize: 16,
        lineNumber: 1,
      });
      expect(features(records).map((feature) => [feature.name(), feature.intervals.length])).toEqual([
        ["gene1", 3],
        ["gene2", 1],
        ["gene3", 1],
      ]);
    });

    test("accounts for every byte across emitted records", async () => {
      const records = await collect(new GffReader().parseString(gff3Data));
      const total = records.reduce((sum, record) => sum + record.rawSize, 0);

      expect(total).toBe(Buffer.byteLength(gff3Data));
    });

    test("joins GFF3 lines that repeat the seed's ID", async () => {
      const data = [
        gffLine("chr1", "src", "CDS", "100", "200", ".", "+", "0", "ID=cds1;Parent=mrna1"),
        gffLine("chr1", "src", "CDS", "300", "400", ".", "+", "2", "ID=cds1;Parent=mrna1"),
        gffLine("chr1", "src", "CDS", "500", "600", ".", "+", "0", "ID=cds2;Parent=mrna1"),
      ].join("\n");

      const grouped = features(await collect(new GffReader().parseString(data)));

      expect(grouped.map((feature) => [feature.name(), feature.intervals.length])).toEqual([
        ["cds1", 2],
        ["cds2", 1],
      ]);
      expect(grouped[0]).toMatchObject({ start: 100, end: 400 });
    });

    test("a grandchild naming a non-seed parent starts a new feature", async () => {
      const data = [
        gffLine("chr1", "src", "gene", "100", "900", ".", "+", ".", "ID=gene1"),
        gffLine("chr1", "src", "mRNA", "100", "900", ".", "+", ".", "ID=mrna1;Parent=gene1"),
        gffLine("chr1", "src", "exon", "100", "200", ".", "+", ".", "Parent=mrna1"),
      ].join("\n");

      const grouped = features(await collect(new GffReader().parseString(data)));

      expect(grouped.map((feature) => feature.intervals.map((i) => i.featureType))).toEqual([
        ["gene", "mRNA"],
        ["exon"],
      ]);
      expect(grouped[1]?.attributes.get("Parent")).toBe("mrna1");
    });

    test("recognises the header after leading blank lines", async () => {
      const records = await collect(new GffReader().parseString(`\n${gff3Data}`));

      expect(records.map((record) => record.kind)).toEqual(["header", "feature", "feature", "feature"]);
      expect(records[0]).toMatchObject({ lineNumber: 2, rawSize: 17 });
    });

    test("groups plain GFF lines by their group column", async () => {
      const data = [
        gffLine("chr1", "src", "exon", "1", "10", ".", "+", ".", "grpA"),
        gffLine("chr1", "src", "exon", "20", "30", ".", "+", ".", "grpA"),
        gffLine("chr1", "src", "exon", "40", "50", ".", "+", ".", "grpB"),
      ].join("\n");

      const grouped = features(await collect(new GffReader().parseString(data)));

      expect(grouped.map((feature) => [feature.name(), feature.intervals.length])).toEqual([
        ["grpA", 2],
        ["grpB", 1],
      ]);
    });

    test("absorbs comments inside a feature without breaking it", async () => {
      const lines = [gtfLines[0] ?? "", "# between exons", gtfLines[1] ?? ""];

      const records = await collect(new GffReader().parseString(`${lines.join("\n")}\n`));

      expect(records.map((record) => record.kind)).toEqual(["feature"]);
      const [feature] = features(records);
      expect(feature?.intervals).toHaveLength(2);
      expect(feature?.rawSize).toBe(sizeOfLines(lines));
    });

    test("emits a leading comment line as the header", async () => {
      const data = `# leading\n${gtfData}`;

      const records = await collect(new GffReader().parseString(data));

      expect(records.map((record) => record.kind)).toEqual(["header", "feature", "feature"]);
      expect(records[0]?.rawSize).toBe(10);
    });

    test("reads an empty input as no records", async () => {
      const stream = new GffReader().parseString("");

      expect(await collect(stream)).toEqual([]);
      expect(stream.summary.skipped).toBe(0);
    });
  });

  describe("malformed lines", () => {
    test("skips a line missing its attribute column and reports it", async () => {
      const short = gffLine("chr1", "src", "exon", "250", "260", ".", "+", ".");
      const lines = [gtfLines[0] ?? "", short, gtfLines[1] ?? ""];
      const onWarning = vi.fn();
      const stream = new GffReader({ onWarning }).parseString(`${lines.join("\n")}\n`);

      const records = await collect(stream);

      const [feature] = features(records);
      expect(records).toHaveLength(1);
      expect(feature?.intervals.map((i) => i.lineNumber)).toEqual([1, 3]);
      expect(feature?.rawSize).toBe(sizeOfLines(lines));
      expect(stream.summary.skipped).toBe(1);
      expect(stream.summary.skippedLines).toEqual([
        { lineNumber: 2, rawText: short, message: "No field for attributes_col (8)" },
      ]);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith("No field for attributes_col (8)", 2);
    });

    test("counts every skipped line but retains at most ten", async () => {
      const data = `${Array.from({ length: 15 }, () => "bad").join("\n")}\n`;
      const stream = new GffReader(quiet).parseString(data);

      expect(await collect(stream)).toEqual([]);
      expect(stream.summary.skipped).toBe(15);
      expect(stream.summary.skippedLines).toHaveLength(10);
      expect(stream.summary.skippedLines[9]?.lineNumber).toBe(10);
      expect(stream.summary.skippedLines[0]?.message).toBe("No field for start_col (3)");
    });

    test("carries bytes of lines skipped before the first feature", async () => {
      const lines = ["bad", gtfLines[0] ?? ""];
      const records = await collect(new GffReader(quiet).parseString(`${lines.join("\n")}\n`));

      expect(features(records)[0]?.rawSize).toBe(sizeOfLines(lines));
    });

    test("ends iteration on a chromosome mismatch within one group", async () => {
      const data = [
        gtfLines[0],
        gffLine("chr2", "src", "exon", "300", "400", ".", "+", ".", 'transcript_id "T1";'),
      ].join("\n");

      await expect(collect(new GffReader().parseString(data))).rejects.toThrow(ChromMismatchError);
    });
  });

  describe("options", () => {
    test("converts coordinates to BED convention", async () => {
      const [feature] = features(
        await collect(new GffReader({ convertToBedCoord: true }).parseString(gtfData))
      );

      expect(feature?.start).toBe(99);
      expect(feature?.end).toBe(600);
      expect(feature?.intervals.map((i) => i.start)).toEqual([99, 299, 499]);
      expect(feature?.intervals[0]?.rawFields[3]).toBe("100");
    });

    test("fixStrand replaces unknown strands with the default", async () => {
      const data = gffLine("chr1", "src", "gene", "1", "10", ".", ".", ".", "ID=g1");
      const [feature] = features(
        await collect(new GffReader({ fixStrand: true, defaultStrand: "-" }).parseString(data))
      );

      expect(feature?.strand).toBe("-");
    });

    test("reads custom column positions", async () => {
      const data = ["chr5\t10\t20\t+\tgene\t0\tx\ty\tID=c1", "chr5\t15\t30\t+\texon\t0\tx\ty\tParent=c1"].join(
        "\n"
      );
      const reader = new GffReader({
        chromCol: 0,
        startCol: 1,
        endCol: 2,
        strandCol: 3,
        featureCol: 4,
        scoreCol: 5,
      });

      const [feature] = features(await collect(reader.parseString(data)));

      expect(feature).toMatchObject({ chrom: "chr5", start: 10, end: 30, featureType: "gene" });
      expect(feature?.intervals).toHaveLength(2);
    });

    test.each([
      [{ chromCol: -1 }],
      [{ chromCol: 1.5 }],
      [{ maxLineLength: 0 }],
      [{ startCol: 4, endCol: 4 }],
    ])("rejects invalid options %o", (options) => {
      expect(() => new GffReader(options)).toThrow(ValidationError);
    });

    test("stops with an aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      const stream = new GffReader({ signal: controller.signal }).parseString(gtfData);

      const error = await collect(stream).then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ format: "ABORTED" });
    });

    test("applies maxLineLength as a skip", async () => {
      const stream = new GffReader({ maxLineLength: 20, onWarning: () => {} }).parseString(gtfData);

      expect(await collect(stream)).toEqual([]);
      expect(stream.summary.skipped).toBe(4);
    });
  });

  describe("streams", () => {
    test("a record stream is consumed once", async () => {
      const stream = new GffReader().parseString(gtfData);

      expect(await collect(stream)).toHaveLength(2);
      expect(await collect(stream)).toEqual([]);
    });

    test("reads CRLF input split across chunks", async () => {
      const data = `${gtfLines.join("\r\n")}\r\n`;
      const bytes = new TextEncoder().encode(data);
      const splitAt = data.indexOf("\r") + 1;
      const input = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(bytes.slice(0, splitAt));
          controller.enqueue(bytes.slice(splitAt));
          controller.close();
        },
      });

      const records = features(await collect(new GffReader().parse(input)));

      expect(records.map((feature) => feature.intervals.length)).toEqual([3, 1]);
      expect(records.reduce((sum, feature) => sum + feature.rawSize, 0)).toBe(bytes.length);
      expect(records[0]?.intervals[0]?.rawFields[8]).toBe('gene_id "G1"; transcript_id "T1";');
    });
  });

  describe("byte accounting", () => {
    const encode = (text: string): number[] => Array.from(new TextEncoder().encode(text));

    test("charges a byte-order mark to the header", async () => {
      const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...encode(gff3Data)]);

      const records = await collect(new GffReader().parse(streamOfBytes(bytes)));

      expect(records[0]).toMatchObject({ kind: "header", rawText: "##gff-version 3", rawSize: 19 });
      expect(records.reduce((sum, record) => sum + record.rawSize, 0)).toBe(bytes.length);
    });

    test("charges an invalid UTF-8 byte at its source width", async () => {
      const line = gffLine("chr1", "src", "gene", "1", "10", ".", "+", ".", "ID=g1;Note=");
      const bytes = new Uint8Array([...encode(line), 0xff, 0x0a]);

      const [feature] = features(await collect(new GffReader().parse(streamOfBytes(bytes))));

      expect(feature?.rawSize).toBe(bytes.length);
      expect(feature?.attributes.get("Note")).toBe("\ufffd");
    });
  });

  describe("releasing the source", () => {
    function endlessTranscripts(
      chromOf: (line: number) => string,
      cancel: () => void
    ): ReadableStream<Uint8Array> {
      let line = 0;
      return new ReadableStream<Uint8Array>({
        pull(controller) {
          line++;
          const transcript = line <= 2 ? "T1" : `T${line}`;
          const text = gffLine(
            chromOf(line),
            "src",
            "exon",
            `${line * 100}`,
            `${line * 100 + 50}`,
            ".",
            "+",
            ".",
            `transcript_id "${transcript}";`
          );
          controller.enqueue(new TextEncoder().encode(`${text}\n`));
        },
        cancel,
      });
    }

    test("cancels the input when the consumer stops early", async () => {
      const cancel = vi.fn();
      const input = endlessTranscripts(() => "chr1", cancel);

      for await (const record of new GffReader().parse(input)) {
        expect(record.kind).toBe("feature");
        break;
      }

      expect(cancel).toHaveBeenCalledTimes(1);
    });

    test("cancels the input when a chromosome mismatch ends the stream", async () => {
      const cancel = vi.fn();
      const input = endlessTranscripts((line) => (line === 2 ? "chr2" : "chr1"), cancel);

      await expect(collect(new GffReader().parse(input))).rejects.toThrow(ChromMismatchError);
      expect(cancel).toHaveBeenCalledTimes(1);
    });
  });

  describe("parseFile", () => {
    let dir = "";

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "gff-reader-"));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("reads a plain file", async () => {
      const path = join(dir, "plain.gtf");
      writeFileSync(path, gtfData);

      const records = features(await collect(new GffReader().parseFile(path)));

      expect(records.map((feature) => feature.name())).toEqual(["G1", "G2"]);
    });

    test("decompresses a gzip file", async () => {
      const path = join(dir, "genes.gff3.gz");
      writeFileSync(path, gzipSync(Buffer.from(gff3Data)));

      const records = await collect(new GffReader().parseFile(path));

      expect(records.map((record) => record.kind)).toEqual(["header", "feature", "feature", "feature"]);
    });

    test("recognises gzip content in a file without a gzip extension", async () => {
      const path = join(dir, "genes.gtf");
      writeFileSync(path, gzipSync(Buffer.from(gtfData)));

      const records = features(await collect(new GffReader().parseFile(path)));

      expect(records.map((feature) => feature.name())).toEqual(["G1", "G2"]);
      expect(records.reduce((sum, feature) => sum + feature.rawSize, 0)).toBe(
        Buffer.byteLength(gtfData)
      );
    });

    test("fails with FileError for a missing file", async () => {
      const stream = new GffReader().parseFile(join(dir, "absent.gff"));

      await expect(collect(stream)).rejects.toThrow(FileError);
    });

    test("rejects an empty path immediately", () => {
      expect(captureError(() => new GffReader().parseFile(""))).toBeInstanceOf(ValidationError);
    });
  });
});
