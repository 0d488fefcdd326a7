export { Contact, type ContactProps, ContactPropsSchema } from './contact.js';
export { Passenger, type PassengerProps, PassengerPropsSchema } from './passenger.js';
export {
  ControlNumberSchema,
  Pnr,
  type PnrAttributes,
  type PnrProps,
  PnrPropsSchema,
} from './pnr.js';
