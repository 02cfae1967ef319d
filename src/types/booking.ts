import { z } from 'zod';
import {
  attendeeSchema,
  bookingReferenceSchema,
  bookingSchema,
  createdBookingSchema,
} from '../services/calcom/calcom.schemas';
import { FailureKind } from '../utils/errors';

export type Attendee = z.infer<typeof attendeeSchema>;
export type CalBooking = z.infer<typeof bookingSchema>;
export type CreatedBooking = z.infer<typeof createdBookingSchema>;
export type BookingReference = z.infer<typeof bookingReferenceSchema>;

export const CANCELLED_STATUS = 'CANCELLED';

export interface CreateBookingPayload {
  start: string;
  end: string;
  eventTypeId: number;
  responses: {
    name: string;
    email: string;
    notes: string;
  };
  timeZone: string;
  language: string;
  metadata: Record<string, unknown>;
}

export interface BookingRequest {
  date: string;
  time: string;
  duration: number;
  reason: string;
  name: string;
  email: string;
}

export interface CancelRequest {
  email: string;
  date: string;
  time: string;
  reason?: string;
}

export interface RescheduleRequest {
  email: string;
  currentDate: string;
  currentTime: string;
  newDate?: string;
  newTime?: string;
  newDuration?: number;
}

export interface BookingSummary {
  Date: string;
  Time: string;
  Duration: string;
  Reason: string;
  Name: string;
  Email: string;
  'Meeting Link': string;
}

export interface UserBookingView {
  startTime: string;
  endTime: string;
  description: string | null;
  timezone: string | null;
  locale: string | null;
  videoCallUrl: string | null;
}

export type ReferenceCleanup = 'deleted' | 'not_found' | 'failed';

export interface CancelOutcome {
  bookingId: number;
  referenceCleanup: ReferenceCleanup;
}

export interface PurgeReport {
  scanned: number;
  removed: number;
  failed: number;
}

export interface BookingSettings {
  timezone: string;
  language: string;
  eventTypeId: number;
}

export interface OperationSuccess<T> {
  success: true;
  message: string;
  data: T;
}

export interface OperationFailure {
  success: false;
  kind: FailureKind;
  message: string;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;
