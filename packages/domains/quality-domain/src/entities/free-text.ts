import { z } from 'zod';

/** Column width of every free-text booking field. */
export const FREE_TEXT_LENGTH = 255;

/** Free text from the extract; may be empty. */
export const FreeTextSchema = z.string().max(FREE_TEXT_LENGTH);
