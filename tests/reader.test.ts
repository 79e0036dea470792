import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readXls, readXlsFile } from "../src/read.js";
import { XlsReader } from "../src/xls/reader.js";
import { BufferSource, type ByteSource } from "../src/source.js";
import { TruncatedRecordError, WorkbookStructureError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
import { RecordType, SheetKind, SubstreamType } from "../src/biff/record-types.js";
import {
	bof,
	boolErrCell,
	blankCell,
	buildXls,
	compoundFile,
	eof,
	formulaNumberCell,
	formulaSpecialCell,
	hyperlink,
	labelCell,
	labelSstCell,
	layout,
	mulrkCell,
	numberCell,
	rkCell,
	rkInt,
	sharedFormula,
	stringRecord,
	workbookRecords,
	workbookStream,
	type RecordSpec,
	type RowSpec,
} from "./helpers/biff.js";

/** Byte source that counts how often it is read and closed */
class CountingSource implements ByteSource {
	reads = 0;
	closes = 0;

	constructor(private readonly data: Uint8Array) {}

	readAll(): Uint8Array {
		this.reads++;
		return this.data;
	}

	close(): void {
		this.closes++;
	}
}

function numberRows(count: number): RowSpec[] {
	return Array.from({ length: count }, (_, i) => ({ index: i, cells: [numberCell(i, 0, i)] }));
}

/** A workbook whose last record is a LABEL "hello" cut after "he" */
function truncatedWorkbook(): Uint8Array {
	const full = labelCell(1, 0, "hello");
	const truncated: RecordSpec = { ...full, body: full.body.subarray(0, 11), declaredSize: full.body.length };
	const records = workbookRecords({
		sheets: [
			{
				name: "Sheet1",
				index: false,
				dbcells: false,
				dimensions: { firstRow: 0, lastRow: 2, firstCol: 0, lastCol: 1 },
				rows: [
					{ index: 0, cells: [numberCell(0, 0, 1)] },
					{ index: 1, cells: [truncated] },
				],
			},
		],
	});
	// drop the sheet EOF so the truncated label ends the stream
	records.pop();
	return compoundFile(layout(records));
}

describe("XlsReader", () => {
	describe("malformed workbook globals", () => {
		const bytes = compoundFile(layout([bof(SubstreamType.Worksheet), eof()]));

		it("should return null on every produceAll() without re-reading the source", () => {
			const source = new CountingSource(bytes);
			const reader = new XlsReader();
			reader.open(source);
			expect(reader.produceAll()).toBeNull();
			expect(reader.produceAll()).toBeNull();
			expect(source.reads).toBe(1);
			expect(source.closes).toBe(1);
			expect(reader.isValid).toBe(false);
			expect(reader.exceptionMessage).toBe("Stream does not start with a workbook globals BOF");
		});

		it("should make readXls throw a WorkbookStructureError", () => {
			expect(() => readXls(bytes)).toThrow(WorkbookStructureError);
		});

		it("should reject bytes that are not a compound file", () => {
			const reader = new XlsReader();
			reader.open(new BufferSource(Uint8Array.of(1, 2, 3)));
			expect(reader.produceAll()).toBeNull();
			expect(reader.failure).toBeInstanceOf(WorkbookStructureError);
			expect(reader.failure).toMatchObject({ code: "INVALID_CONTAINER" });
		});

		it("should reject a compound file without a workbook stream", () => {
			const other = compoundFile(workbookStream({ sheets: [] }), "Other");
			expect(() => readXls(other)).toThrow(
				expect.objectContaining({ code: "WORKBOOK_STREAM_NOT_FOUND" }),
			);
		});

		it("should reject encrypted workbooks", () => {
			const records = workbookRecords({ sheets: [] });
			records.splice(1, 0, { id: RecordType.FILEPASS, body: new Uint8Array(6) });
			expect(() => readXls(compoundFile(layout(records)))).toThrow(
				expect.objectContaining({ code: "WORKBOOK_ENCRYPTED" }),
			);
		});
	});

	it("should read the stream of older producers named Book", () => {
		const stream = workbookStream({ sheets: [{ name: "Old", rows: numberRows(2) }] });
		const tables = readXls(compoundFile(stream, "Book"));
		expect(tables.map((t) => t.name)).toEqual(["Old"]);
	});

	describe("close()", () => {
		it("should not raise when called before open", () => {
			const reader = new XlsReader();
			expect(() => {
				reader.close();
				reader.close();
			}).not.toThrow();
			expect(reader.produceAll()).toBeNull();
		});

		it("should release the source once", () => {
			const source = new CountingSource(buildXls({ sheets: [{ name: "S", rows: numberRows(1) }] }));
			const reader = new XlsReader();
			reader.open(source);
			expect(reader.produceAll()).toHaveLength(1);
			reader.close();
			reader.close();
			expect(source.closes).toBe(1);
		});

		it("should keep the cached tables after close", () => {
			const reader = new XlsReader();
			reader.open(new BufferSource(buildXls({ sheets: [{ name: "S", rows: numberRows(1) }] })));
			const first = reader.produceAll();
			reader.close();
			expect(reader.produceAll()).toBe(first);
		});
	});

	it("should refuse a second open()", () => {
		const bytes = buildXls({ sheets: [{ name: "S", rows: numberRows(1) }] });
		const reader = new XlsReader();
		reader.open(new BufferSource(bytes));
		const second = new CountingSource(bytes);
		expect(() => reader.open(second)).toThrow("XlsReader.open() can only be called once");
		expect(second.closes).toBe(1);
	});

	describe("truncated final record", () => {
		it("should keep the partial record in loose mode", () => {
			const tables = readXls(truncatedWorkbook(), { mode: "loose" });
			expect(tables[0].rows).toEqual([[{ t: "n", v: 1 }], [{ t: "s", v: "he" }]]);
		});

		it("should fail in strict mode", () => {
			expect(() => readXls(truncatedWorkbook())).toThrow(TruncatedRecordError);
		});

		it("should invalidate a strict reader and rethrow only once", () => {
			const source = new CountingSource(truncatedWorkbook());
			const reader = new XlsReader({ mode: "strict" });
			reader.open(source);
			expect(() => reader.produceAll()).toThrow(TruncatedRecordError);
			expect(reader.produceAll()).toBeNull();
			expect(reader.isValid).toBe(false);
			expect(source.closes).toBe(1);
		});

		it("should report the truncated record", () => {
			const reader = new XlsReader();
			reader.open(new BufferSource(truncatedWorkbook()));
			expect(() => reader.produceAll()).toThrow(
				expect.objectContaining({ declaredSize: 14, availableSize: 11 }),
			);
		});
	});

	it("should list worksheets only", () => {
		const reader = new XlsReader();
		reader.open(
			new BufferSource(
				buildXls({
					sheets: [
						{ name: "Data", rows: numberRows(1) },
						{ name: "More", rows: numberRows(1) },
					],
					otherSheets: [{ name: "Chart1", type: SheetKind.Chart }],
				}),
			),
		);
		expect(reader.sheetNames).toEqual(["Data", "More"]);
		expect(reader.readMode).toBe("strict");
	});

	it("should restrict extraction to the selected sheets", () => {
		const bytes = buildXls({
			sheets: [
				{ name: "A", rows: numberRows(1) },
				{ name: "B", rows: numberRows(2) },
				{ name: "C", rows: numberRows(3) },
			],
		});
		expect(readXls(bytes, { sheets: "B" }).map((t) => t.name)).toEqual(["B"]);
		expect(readXls(bytes, { sheets: [0, "C"] }).map((t) => t.name)).toEqual(["A", "C"]);
	});

	it("should cap rows with sheetRows", () => {
		const bytes = buildXls({ sheets: [{ name: "S", rows: numberRows(25), blockSize: 10 }] });
		const [table] = readXls(bytes, { sheetRows: 5 });
		expect(table.rows).toHaveLength(5);
		expect(table.rows[4]).toEqual([{ t: "n", v: 4 }]);
	});

	it("should log an unsupported codepage and keep reading", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "warn", destination: { write: (msg: string) => lines.push(msg) } });
		const bytes = buildXls({ codepage: 12345, sheets: [{ name: "S", rows: numberRows(1) }] });
		const tables = readXls(bytes, { logger });
		expect(tables).toHaveLength(1);
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0])).toMatchObject({
			level: 40,
			codepage: 12345,
			msg: "unsupported codepage, keeping default encoding",
			service: "xls-reader",
		});
	});

	it("should expose the workbook globals after open()", () => {
		const reader = new XlsReader();
		expect(reader.globals).toBeUndefined();
		reader.open(
			new BufferSource(
				buildXls({
					codepage: 1251,
					fonts: [200, 240],
					sheets: [
						{ name: "Shown", rows: numberRows(1) },
						{ name: "Hidden", rows: numberRows(1), visibility: 1 },
						{ name: "Secret", rows: numberRows(1), visibility: 2 },
					],
				}),
			),
		);
		const { globals } = reader;
		expect(globals?.biff).toBe(8);
		expect(globals?.encoding).toBe("windows-1251");
		expect(globals?.sheets.map((s) => [s.name, s.visibility])).toEqual([
			["Shown", "visible"],
			["Hidden", "hidden"],
			["Secret", "veryHidden"],
		]);
		expect(globals?.fonts).toHaveLength(2);
		expect(globals?.fonts[1].subarray(0, 2)).toEqual(Uint8Array.of(240, 0));
		reader.close();
	});

	it("should report the default encoding without a CODEPAGE record", () => {
		const reader = new XlsReader();
		reader.open(new BufferSource(buildXls({ sheets: [{ name: "S", rows: numberRows(1) }] })));
		expect(reader.globals?.encoding).toBe("windows-1252");
		reader.close();
	});

	it("should read a workbook from a file", () => {
		const dir = mkdtempSync(join(tmpdir(), "xls-reader-"));
		try {
			const path = join(dir, "book.xls");
			writeFileSync(path, buildXls({ sheets: [{ name: "OnDisk", rows: numberRows(3) }] }));
			const [table] = readXlsFile(path);
			expect(table.name).toBe("OnDisk");
			expect(table.rows.map((r) => r[0]?.v)).toEqual([0, 1, 2]);
		} finally {
			rmSync(dir, { recursive: true, force: true });
		}
	});

	it("should accept an ArrayBuffer", () => {
		const bytes = buildXls({ sheets: [{ name: "S", rows: numberRows(2) }] });
		const copy = new ArrayBuffer(bytes.byteLength);
		new Uint8Array(copy).set(bytes);
		expect(readXls(copy)[0].rows).toHaveLength(2);
	});
});

describe("cell values", () => {
	const bytes = buildXls({
		sst: ["alpha", "beta"],
		sheets: [
			{
				name: "Cells",
				dimensions: { firstRow: 0, lastRow: 1, firstCol: 0, lastCol: 12 },
				rows: [
					{
						index: 0,
						cells: [
							labelSstCell(0, 0, 1),
							labelSstCell(0, 1, 5),
							boolErrCell(0, 2, 1, false),
							boolErrCell(0, 3, 0x07, true),
							formulaSpecialCell(0, 4, 0),
							sharedFormula(),
							stringRecord("calc"),
							formulaSpecialCell(0, 5, 1, 1),
							formulaSpecialCell(0, 6, 2, 0x07),
							formulaSpecialCell(0, 7, 3),
							formulaNumberCell(0, 8, 2.5),
							blankCell(0, 9),
							rkCell(0, 10, rkInt(-3)),
							labelCell(0, 11, "inline"),
						],
					},
				],
			},
		],
	});

	it("should decode every cell kind", () => {
		const [table] = readXls(bytes);
		expect(table.columns).toEqual(["0", "1", "2", "3", "4", "5", "6", "7", "8", "9", "10", "11"]);
		expect(table.rows).toEqual([
			[
				{ t: "s", v: "beta" },
				null,
				{ t: "b", v: true },
				null,
				{ t: "s", v: "calc" },
				{ t: "b", v: true },
				null,
				{ t: "s", v: "" },
				{ t: "n", v: 2.5 },
				null,
				{ t: "n", v: -3 },
				{ t: "s", v: "inline" },
			],
		]);
	});

	it("should keep the later of two writes to one column", () => {
		const [table] = readXls(
			buildXls({
				sheets: [{ name: "S", rows: [{ index: 0, cells: [numberCell(0, 0, 1), numberCell(0, 0, 2)] }] }],
			}),
		);
		expect(table.rows).toEqual([[{ t: "n", v: 2 }]]);
	});

	it("should write MULRK values only inside the sheet's columns", () => {
		const values = [1, 2, 3, 4].map((v) => ({ xf: 0, rk: rkInt(v) }));
		const [table] = readXls(
			buildXls({
				sheets: [
					{
						name: "S",
						dimensions: { firstRow: 0, lastRow: 1, firstCol: 0, lastCol: 4 },
						rows: [{ index: 0, cells: [mulrkCell(0, 2, values)] }],
					},
				],
			}),
		);
		expect(table.rows).toEqual([[null, null, { t: "n", v: 1 }, { t: "n", v: 2 }]]);
	});

	it("should attach hyperlinks to cells and ranges", () => {
		const [table] = readXls(
			buildXls({
				sheets: [
					{
						name: "Links",
						rows: [
							{ index: 0, cells: [labelCell(0, 0, "range"), labelCell(0, 1, "site")] },
							{ index: 1, cells: [labelCell(1, 0, "range too"), labelCell(1, 1, "plain")] },
						],
						hyperlinks: [
							hyperlink(0, 0, 1, 1, "https://example.com/"),
							hyperlink(0, 1, 0, 0, "https://example.org/list"),
						],
					},
				],
			}),
		);
		expect(table.rows).toEqual([
			[
				{ t: "s", v: "range", l: { Target: "https://example.org/list" } },
				{ t: "s", v: "site", l: { Target: "https://example.com/" } },
			],
			[{ t: "s", v: "range too", l: { Target: "https://example.org/list" } }, { t: "s", v: "plain" }],
		]);
	});
});

describe("date reclassification", () => {
	function readSerial(options: { xfs?: number[]; formats?: [number, string][]; date1904?: boolean }, xf: number, value = 41640) {
		const [table] = readXls(
			buildXls({ ...options, sheets: [{ name: "S", rows: [{ index: 0, cells: [numberCell(0, 0, value, xf)] }] }] }),
		);
		return table.rows[0][0];
	}

	it("should turn 41640 under format 14 into 2014-01-01", () => {
		expect(readSerial({ xfs: [0, 14] }, 1)).toEqual({ t: "d", v: new Date(Date.UTC(2014, 0, 1)) });
	});

	it("should keep 41640 under General a number", () => {
		expect(readSerial({ xfs: [0, 14] }, 0)).toEqual({ t: "n", v: 41640 });
	});

	it("should classify custom formats by their pattern", () => {
		const formats: [number, string][] = [
			[164, "yyyy-mm-dd"],
			[165, "#,##0.000"],
		];
		expect(readSerial({ xfs: [0, 164, 165], formats }, 1)).toEqual({
			t: "d",
			v: new Date(Date.UTC(2014, 0, 1)),
		});
		expect(readSerial({ xfs: [0, 164, 165], formats }, 2)).toEqual({ t: "n", v: 41640 });
	});

	it("should render numbers under the text format as strings", () => {
		expect(readSerial({ xfs: [0, 49] }, 1, 12.5)).toEqual({ t: "s", v: "12.5" });
	});

	it("should use the 1904 date system when the workbook says so", () => {
		expect(readSerial({ xfs: [0, 14], date1904: true }, 1, 40178)).toEqual({
			t: "d",
			v: new Date(Date.UTC(2014, 0, 1)),
		});
	});

	it("should leave numbers alone with cellDates off", () => {
		const bytes = buildXls({
			xfs: [0, 14],
			sheets: [{ name: "S", rows: [{ index: 0, cells: [numberCell(0, 0, 41640, 1)] }] }],
		});
		expect(readXls(bytes, { cellDates: false })[0].rows).toEqual([[{ t: "n", v: 41640 }]]);
	});
});
