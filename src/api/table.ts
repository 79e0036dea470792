import type { CellValue, ColumnType, DataTable } from "../types.js";

/** Plain value of a cell */
export type PlainValue = boolean | number | string | Date | null;

export interface TableToRowsOptions {
	/** If false, every value is turned into text; dates as ISO 8601 (default: true) */
	raw?: boolean;
}

export interface TableToObjectsOptions extends TableToRowsOptions {
	/**
	 * Object keys:
	 * - "first-row": the first row's values, which are not returned as data (default)
	 * - "index": the table's column names ("0", "1", ...)
	 * - string[]: caller-supplied keys by column position
	 */
	header?: "first-row" | "index" | string[];
	/** Value for empty cells; when undefined, empty cells are left out of the object */
	defval?: PlainValue;
	/** Keep rows without any value (default: false) */
	blankrows?: boolean;
}

function plain(cell: CellValue | null, raw: boolean): PlainValue {
	if (cell === null) {
		return null;
	}
	if (raw) {
		return cell.v;
	}
	return cell.v instanceof Date ? cell.v.toISOString() : String(cell.v);
}

/**
 * Convert a table to an array of arrays of plain values.
 *
 * @param table - Table returned by the reader
 * @param options - Conversion options
 */
export function tableToRows(table: DataTable, options: TableToRowsOptions = {}): PlainValue[][] {
	const raw = options.raw !== false;
	return table.rows.map((row) => row.map((cell) => plain(cell, raw)));
}

/** Header labels from the first row; blank labels become "__EMPTY", repeats get "_1", "_2", ... */
function headerLabels(table: DataTable): string[] {
	const first = table.rows[0] ?? [];
	const seen = new Map<string, number>();
	return table.columns.map((_, col) => {
		const cell = first[col] ?? null;
		const base = cell === null ? "__EMPTY" : String(plain(cell, false));
		let counter = seen.get(base) ?? 0;
		let label = base;
		if (counter > 0) {
			do {
				label = `${base}_${counter++}`;
			} while (seen.has(label));
			seen.set(label, 1);
		}
		seen.set(base, counter || 1);
		return label;
	});
}

/**
 * Convert a table to an array of objects keyed by header labels.
 *
 * @param table - Table returned by the reader
 * @param options - Conversion options
 * @returns One object per data row
 */
export function tableToObjects(
	table: DataTable,
	options: TableToObjectsOptions = {},
): Record<string, PlainValue>[] {
	const raw = options.raw !== false;
	const header = options.header ?? "first-row";
	let keys: readonly (string | undefined)[];
	let data = table.rows;
	if (header === "first-row") {
		keys = headerLabels(table);
		data = table.rows.slice(1);
	} else if (header === "index") {
		keys = table.columns;
	} else {
		keys = header;
	}

	const out: Record<string, PlainValue>[] = [];
	for (const row of data) {
		const obj: Record<string, PlainValue> = {};
		let empty = true;
		row.forEach((cell, col) => {
			const key = keys[col];
			if (key === undefined) {
				return;
			}
			if (cell === null) {
				if (options.defval !== undefined) {
					obj[key] = options.defval;
				}
				return;
			}
			obj[key] = plain(cell, raw);
			empty = false;
		});
		if (!empty || options.blankrows) {
			out.push(obj);
		}
	}
	return out;
}

const TYPE_NAMES = { b: "boolean", n: "number", s: "string", d: "date" } as const;

/**
 * Determine the value type of every column.
 *
 * A column is "empty" when it holds no value and "mixed" when its values
 * have more than one type. Links do not affect the result.
 */
export function inferColumnTypes(table: DataTable): ColumnType[] {
	return table.columns.map((_, col) => {
		let type: ColumnType = "empty";
		for (const row of table.rows) {
			const cell = row[col];
			if (!cell) {
				continue;
			}
			const t = TYPE_NAMES[cell.t];
			if (type === "empty") {
				type = t;
			} else if (type !== t) {
				return "mixed";
			}
		}
		return type;
	});
}
