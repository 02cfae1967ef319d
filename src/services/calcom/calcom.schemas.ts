import { z } from 'zod';

export const attendeeSchema = z
  .object({
    email: z.string(),
    name: z.string().nullish(),
    timeZone: z.string(),
    locale: z.string().nullish(),
  })
  .passthrough();

export const bookingSchema = z
  .object({
    id: z.number(),
    status: z.string().nullish(),
    startTime: z.string(),
    endTime: z.string(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    attendees: z.array(attendeeSchema).default([]),
    metadata: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const bookingEnvelopeSchema = z.object({ booking: bookingSchema }).passthrough();

export const createdBookingSchema = z
  .object({
    id: z.number().optional(),
    uid: z.string().optional(),
    metadata: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const bookingReferenceSchema = z
  .object({
    id: z.number(),
    bookingId: z.number().nullish(),
    deleted: z.boolean().nullish(),
    type: z.string().nullish(),
    uid: z.string().nullish(),
  })
  .passthrough();

export const bookingReferenceListSchema = z
  .object({ booking_references: z.array(bookingReferenceSchema).default([]) })
  .passthrough();

export const updatedBookingSchema = z.record(z.unknown());
