import { randomUUID } from 'node:crypto';
import { Entity } from '@pnr-quality/domain-kernel';
import { z } from 'zod';
import { hasSeat } from '../services/quality-scorer.js';
import { FreeTextSchema } from './free-text.js';

export const PassengerPropsSchema = z.object({
  id: z.string().uuid(),
  pnrId: z.string().uuid(),
  surname: FreeTextSchema,
  firstName: FreeTextSchema,
  ffNumber: FreeTextSchema,
  meal: FreeTextSchema,
  seatRowNumber: FreeTextSchema,
  seatColumn: FreeTextSchema,
});

export type PassengerProps = z.infer<typeof PassengerPropsSchema>;

export class Passenger extends Entity<PassengerProps> {
  private constructor(props: PassengerProps) {
    super(props);
  }

  static create(input: {
    pnrId: string;
    surname: string;
    firstName: string;
    ffNumber?: string;
    meal?: string;
    seatRowNumber?: string;
    seatColumn?: string;
  }): Passenger {
    return new Passenger(
      PassengerPropsSchema.parse({
        id: randomUUID(),
        pnrId: input.pnrId,
        surname: input.surname.trim(),
        firstName: input.firstName.trim(),
        ffNumber: input.ffNumber?.trim() ?? '',
        meal: input.meal?.trim() ?? '',
        seatRowNumber: input.seatRowNumber?.trim() ?? '',
        seatColumn: input.seatColumn?.trim() ?? '',
      }),
    );
  }

  static reconstitute(props: PassengerProps): Passenger {
    return new Passenger(PassengerPropsSchema.parse(props));
  }

  get pnrId(): string {
    return this.props.pnrId;
  }
  get surname(): string {
    return this.props.surname;
  }
  get firstName(): string {
    return this.props.firstName;
  }
  get ffNumber(): string {
    return this.props.ffNumber;
  }
  get meal(): string {
    return this.props.meal;
  }
  get seatRowNumber(): string {
    return this.props.seatRowNumber;
  }
  get seatColumn(): string {
    return this.props.seatColumn;
  }

  /** Row and column together, or '' unless both are present. */
  get seat(): string {
    return hasSeat(this.props.seatRowNumber, this.props.seatColumn)
      ? `${this.props.seatRowNumber}${this.props.seatColumn}`
      : '';
  }

  /** Identity within a PNR: (surname, first name). */
  get identityKey(): string {
    return JSON.stringify([this.props.surname, this.props.firstName]);
  }
}
