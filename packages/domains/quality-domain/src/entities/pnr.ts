import { randomUUID } from 'node:crypto';
import { Entity, InvariantViolation, ValidationError } from '@pnr-quality/domain-kernel';
import { z } from 'zod';
import { Contact } from './contact.js';
import { FreeTextSchema } from './free-text.js';
import { Passenger } from './passenger.js';

export const ControlNumberSchema = z
  .string()
  .trim()
  .min(1, 'Control number is required')
  .max(20);

export const PnrPropsSchema = z.object({
  id: z.string().uuid(),
  controlNumber: ControlNumberSchema,
  officeId: FreeTextSchema,
  agent: FreeTextSchema,
  deliverySystemCompany: FreeTextSchema,
  deliverySystemLocation: FreeTextSchema,
  creationDate: z.coerce.date().nullable(),
  createdAt: z.coerce.date(),
});

export type PnrProps = z.infer<typeof PnrPropsSchema>;

export interface PnrAttributes {
  officeId?: string;
  agent?: string;
  deliverySystemCompany?: string;
  deliverySystemLocation?: string;
  creationDate?: Date | null;
}

export class Pnr extends Entity<PnrProps> {
  private readonly passengerList: Passenger[] = [];
  private readonly contactList: Contact[] = [];
  private readonly passengerKeys = new Set<string>();
  private readonly contactKeys = new Set<string>();

  private constructor(props: PnrProps) {
    super(props);
  }

  // ---- Factory methods ----

  /**
   * Strict creation path: an empty or whitespace-only control number is a
   * ValidationError. The bulk importer filters such rows out beforehand.
   */
  static create(input: { controlNumber: string } & PnrAttributes): Pnr {
    const parsed = PnrPropsSchema.safeParse({
      id: randomUUID(),
      controlNumber: input.controlNumber,
      officeId: input.officeId?.trim() ?? '',
      agent: input.agent?.trim() ?? '',
      deliverySystemCompany: input.deliverySystemCompany?.trim() ?? '',
      deliverySystemLocation: input.deliverySystemLocation?.trim() ?? '',
      creationDate: input.creationDate ?? null,
      createdAt: new Date(),
    });
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid PNR', parsed.error);
    }
    return new Pnr(parsed.data);
  }

  static reconstitute(
    props: PnrProps,
    children: { passengers?: Passenger[]; contacts?: Contact[] } = {},
  ): Pnr {
    const pnr = new Pnr(PnrPropsSchema.parse(props));
    for (const passenger of children.passengers ?? []) pnr.attachPassenger(passenger);
    for (const contact of children.contacts ?? []) pnr.attachContact(contact);
    return pnr;
  }

  // ---- Accessors ----

  get controlNumber(): string {
    return this.props.controlNumber;
  }
  get officeId(): string {
    return this.props.officeId;
  }
  get agent(): string {
    return this.props.agent;
  }
  get deliverySystemCompany(): string {
    return this.props.deliverySystemCompany;
  }
  get deliverySystemLocation(): string {
    return this.props.deliverySystemLocation;
  }
  get creationDate(): Date | null {
    return this.props.creationDate;
  }
  get createdAt(): Date {
    return this.props.createdAt;
  }
  get passengers(): readonly Passenger[] {
    return this.passengerList;
  }
  get contacts(): readonly Contact[] {
    return this.contactList;
  }

  // ---- Domain methods ----

  /** Adds a passenger unless one with the same surname and first name exists. */
  addPassenger(input: {
    surname: string;
    firstName: string;
    ffNumber?: string;
    meal?: string;
    seatRowNumber?: string;
    seatColumn?: string;
  }): Passenger | null {
    return this.attachPassenger(Passenger.create({ pnrId: this.id, ...input }));
  }

  /** Adds a contact unless one with the same type and detail exists. */
  addContact(input: { contactType: string; contactDetail: string }): Contact | null {
    return this.attachContact(Contact.create({ pnrId: this.id, ...input }));
  }

  /** Overwrites the dimension attributes (update-or-create path). */
  updateAttributes(input: PnrAttributes): void {
    if (input.officeId !== undefined) this.props.officeId = input.officeId.trim();
    if (input.agent !== undefined) this.props.agent = input.agent.trim();
    if (input.deliverySystemCompany !== undefined) {
      this.props.deliverySystemCompany = input.deliverySystemCompany.trim();
    }
    if (input.deliverySystemLocation !== undefined) {
      this.props.deliverySystemLocation = input.deliverySystemLocation.trim();
    }
    if (input.creationDate !== undefined) this.props.creationDate = input.creationDate;
  }

  /**
   * Attaches an already validated passenger of this PNR; null when one with
   * the same surname and first name is attached already.
   */
  attachPassenger(passenger: Passenger): Passenger | null {
    this.assertOwned(passenger.pnrId);
    if (this.passengerKeys.has(passenger.identityKey)) return null;
    this.passengerKeys.add(passenger.identityKey);
    this.passengerList.push(passenger);
    return passenger;
  }

  /** Attaches an already validated contact; null on a duplicate type and detail. */
  attachContact(contact: Contact): Contact | null {
    this.assertOwned(contact.pnrId);
    if (this.contactKeys.has(contact.identityKey)) return null;
    this.contactKeys.add(contact.identityKey);
    this.contactList.push(contact);
    return contact;
  }

  private assertOwned(pnrId: string): void {
    if (pnrId !== this.id) {
      throw new InvariantViolation(`Child of PNR ${pnrId} attached to ${this.controlNumber}`);
    }
  }
}
