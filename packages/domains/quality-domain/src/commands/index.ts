export {
  type CorrectMealCodesCommand,
  CorrectMealCodesCommandSchema,
  correctMealCodesCommand,
} from './correct-meal-codes.js';
export {
  type ImportMode,
  ImportModeSchema,
  type ImportRow,
  type ImportRowsCommand,
  ImportRowSchema,
  ImportRowsCommandSchema,
  importRowsCommand,
  type ParsedImportRow,
  type ParsedImportRowsCommand,
  type UpsertRowCommand,
  UpsertRowCommandSchema,
  upsertRowCommand,
} from './import-rows.js';
