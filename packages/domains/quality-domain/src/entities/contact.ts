import { randomUUID } from 'node:crypto';
import { Entity } from '@pnr-quality/domain-kernel';
import { z } from 'zod';
import {
  classifyContact,
  type ContactClassification,
  contactVerdict,
  type ContactVerdict,
  isUsableContact,
} from '../services/contact-classifier.js';
import { FreeTextSchema } from './free-text.js';

export const ContactPropsSchema = z.object({
  id: z.string().uuid(),
  pnrId: z.string().uuid(),
  // Kept verbatim: unknown types are classified by shape only.
  contactType: FreeTextSchema,
  contactDetail: FreeTextSchema,
});

export type ContactProps = z.infer<typeof ContactPropsSchema>;

export class Contact extends Entity<ContactProps> {
  private cachedClassification: ContactClassification | null = null;

  private constructor(props: ContactProps) {
    super(props);
  }

  static create(input: {
    pnrId: string;
    contactType: string;
    contactDetail: string;
  }): Contact {
    return new Contact(
      ContactPropsSchema.parse({
        id: randomUUID(),
        pnrId: input.pnrId,
        contactType: input.contactType.trim().toUpperCase(),
        contactDetail: input.contactDetail.trim(),
      }),
    );
  }

  static reconstitute(props: ContactProps): Contact {
    return new Contact(ContactPropsSchema.parse(props));
  }

  get pnrId(): string {
    return this.props.pnrId;
  }
  get contactType(): string {
    return this.props.contactType;
  }
  get contactDetail(): string {
    return this.props.contactDetail;
  }

  /** Identity within a PNR: (type, detail). */
  get identityKey(): string {
    return JSON.stringify([this.props.contactType, this.props.contactDetail]);
  }

  get classification(): ContactClassification {
    this.cachedClassification ??= classifyContact(
      this.props.contactType,
      this.props.contactDetail,
    );
    return this.cachedClassification;
  }

  get isUsable(): boolean {
    return isUsableContact(this.classification);
  }

  get verdict(): ContactVerdict {
    return contactVerdict(this.classification);
  }
}
