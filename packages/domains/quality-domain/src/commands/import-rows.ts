import { z } from 'zod';

/** Spreadsheet cell: text, number or blank, read as a trimmed string. */
const CellSchema = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) => (value == null ? '' : String(value).trim()));

export const ImportRowSchema = z.object({
  ControlNumber: CellSchema,
  Surname: CellSchema,
  FirstName: CellSchema,
  ContactType: CellSchema,
  ContactDetail: CellSchema,
  OfficeID: CellSchema,
  Agent: CellSchema,
  /** Compact `ddmmyy` / `dmmyy`. */
  creationDate: CellSchema,
  DeliverySystemCompany: CellSchema,
  DeliverySystemLocation: CellSchema,
  FFNumber: CellSchema,
  Meal: CellSchema,
  SeatRowNumber: CellSchema,
  SeatColumn: CellSchema,
});

export type ImportRow = z.input<typeof ImportRowSchema>;
export type ParsedImportRow = z.output<typeof ImportRowSchema>;

export const ImportModeSchema = z.enum(['replace', 'append']);
export type ImportMode = z.infer<typeof ImportModeSchema>;

export const ImportRowsCommandSchema = z.object({
  /** `replace` clears every PNR before inserting; `append` keeps them. */
  mode: ImportModeSchema.default('replace'),
  /** Batch of extract rows, one per passenger/contact combination. */
  rows: z.array(ImportRowSchema).min(1),
});

export type ImportRowsCommand = z.input<typeof ImportRowsCommandSchema>;
export type ParsedImportRowsCommand = z.output<typeof ImportRowsCommandSchema>;

export function importRowsCommand(input: ImportRowsCommand): ParsedImportRowsCommand {
  return ImportRowsCommandSchema.parse(input);
}

export const UpsertRowCommandSchema = z.object({
  row: ImportRowSchema,
});

export type UpsertRowCommand = z.input<typeof UpsertRowCommandSchema>;

export function upsertRowCommand(input: UpsertRowCommand): z.output<typeof UpsertRowCommandSchema> {
  return UpsertRowCommandSchema.parse(input);
}
