/**
 * BIFF record identifiers.
 *
 * Some record kinds use a different id in each BIFF version ("_V2" for
 * BIFF2, "_V3" for BIFF3, ...), each with its own payload layout. The
 * other ids are the same in every version.
 */
export const RecordType = {
	// Stream structure
	BOF: 0x0809,
	BOF_V2: 0x0009,
	BOF_V3: 0x0209,
	BOF_V4: 0x0409,
	EOF: 0x000a,
	CONTINUE: 0x003c,

	// Workbook globals
	BOUNDSHEET: 0x0085,
	CODEPAGE: 0x0042,
	DATEMODE: 0x0022,
	FILEPASS: 0x002f,
	FONT: 0x0031,
	FONT_V34: 0x0231,
	FORMAT: 0x041e,
	FORMAT_V23: 0x001e,
	XF: 0x00e0,
	XF_V2: 0x0043,
	XF_V3: 0x0243,
	XF_V4: 0x0443,
	SST: 0x00fc,

	// Worksheet structure
	INDEX: 0x020b,
	UNCALCED: 0x005e,
	DIMENSIONS: 0x0200,
	ROW: 0x0208,
	DBCELL: 0x00d7,
	HLINK: 0x01b8,

	// Cells
	BLANK: 0x0201,
	BLANK_OLD: 0x0001,
	MULBLANK: 0x00be,
	INTEGER: 0x0202,
	INTEGER_OLD: 0x0002,
	NUMBER: 0x0203,
	NUMBER_OLD: 0x0003,
	LABEL: 0x0204,
	LABEL_OLD: 0x0004,
	RSTRING: 0x00d6,
	LABELSST: 0x00fd,
	BOOLERR: 0x0205,
	BOOLERR_OLD: 0x0005,
	RK: 0x027e,
	MULRK: 0x00bd,
	FORMULA: 0x0006,
	FORMULA_V3: 0x0206,
	FORMULA_V4: 0x0406,

	// Records trailing a formula
	STRING: 0x0207,
	STRING_OLD: 0x0007,
	SHAREDFMLA: 0x04bc,
	ARRAY: 0x0221,
	TABLE: 0x0236,
} as const;

/** BOF substream types (the `dt` field of a BOF record) */
export const SubstreamType = {
	WorkbookGlobals: 0x0005,
	VisualBasicModule: 0x0006,
	Worksheet: 0x0010,
	Chart: 0x0020,
	MacroSheet: 0x0040,
	Workspace: 0x0100,
} as const;

/** BOUNDSHEET sheet types */
export const SheetKind = {
	Worksheet: 0x00,
	MacroSheet: 0x01,
	Chart: 0x02,
	VisualBasicModule: 0x06,
} as const;

/** BOF version field of BIFF8 workbooks; anything lower uses the older layouts */
export const BIFF8_VERSION = 0x0600;
