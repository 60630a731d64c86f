import type { Slot } from '@core/interfaces/calendar.types.js';
import type { StateName } from '@core/interfaces/flow.types.js';

export interface Session {
  state: StateName;
  updatedAt: Date;
  /** Slots shown by the last `offer_slots` state, kept until one is booked. */
  offeredSlots?: Slot[];
}

export interface Decision {
  next: StateName;
  /** False when the input was not understood and the caller should reset to the menu. */
  handled: boolean;
}

export const sessionKey = (tenant: string, userId: string): string => `${tenant}:${userId}`;
