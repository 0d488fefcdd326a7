import {
  date,
  index,
  pgSchema,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';
import { FREE_TEXT_LENGTH } from '../src/entities/free-text.js';

export const qualitySchema = pgSchema('quality');

// pnrs: one row per booking record, keyed by control number
export const pnrs = qualitySchema.table(
  'pnrs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    control_number: varchar('control_number', { length: 20 }).notNull(),
    office_id: varchar('office_id', { length: FREE_TEXT_LENGTH }).notNull().default(''),
    agent: varchar('agent', { length: FREE_TEXT_LENGTH }).notNull().default(''),
    delivery_system_company: varchar('delivery_system_company', { length: FREE_TEXT_LENGTH })
      .notNull()
      .default(''),
    delivery_system_location: varchar('delivery_system_location', { length: FREE_TEXT_LENGTH })
      .notNull()
      .default(''),
    creation_date: date('creation_date', { mode: 'string' }),
    created_at: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => ({
    controlNumberIdx: uniqueIndex('pnrs_control_number_idx').on(
      table.control_number,
    ),
    creationOfficeIdx: index('pnrs_creation_office_idx').on(
      table.creation_date,
      table.office_id,
    ),
    deliveryCreationIdx: index('pnrs_delivery_creation_idx').on(
      table.delivery_system_company,
      table.creation_date,
    ),
  }),
);

export const passengers = qualitySchema.table(
  'passengers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    pnr_id: uuid('pnr_id')
      .notNull()
      .references(() => pnrs.id, { onDelete: 'cascade' }),
    surname: varchar('surname', { length: FREE_TEXT_LENGTH }).notNull(),
    first_name: varchar('first_name', { length: FREE_TEXT_LENGTH }).notNull(),
    ff_number: varchar('ff_number', { length: FREE_TEXT_LENGTH }).notNull().default(''),
    meal: varchar('meal', { length: FREE_TEXT_LENGTH }).notNull().default(''),
    seat_row_number: varchar('seat_row_number', { length: FREE_TEXT_LENGTH })
      .notNull()
      .default(''),
    seat_column: varchar('seat_column', { length: FREE_TEXT_LENGTH }).notNull().default(''),
  },
  (table) => ({
    identityIdx: uniqueIndex('passengers_identity_idx').on(
      table.pnr_id,
      table.surname,
      table.first_name,
    ),
  }),
);

// contacts: raw contact strings; classification is derived, never stored
export const contacts = qualitySchema.table(
  'contacts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    pnr_id: uuid('pnr_id')
      .notNull()
      .references(() => pnrs.id, { onDelete: 'cascade' }),
    contact_type: varchar('contact_type', { length: FREE_TEXT_LENGTH }).notNull(),
    contact_detail: varchar('contact_detail', { length: FREE_TEXT_LENGTH }).notNull(),
  },
  (table) => ({
    identityIdx: uniqueIndex('contacts_identity_idx').on(
      table.pnr_id,
      table.contact_type,
      table.contact_detail,
    ),
    typeDetailIdx: index('contacts_type_detail_idx').on(
      table.contact_type,
      table.contact_detail,
    ),
  }),
);
