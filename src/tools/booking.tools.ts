import { z } from 'zod';
import { defineTool, RegisteredTool } from './registry';
import { BookingService } from '../services/booking.service';

export const BOOKING_TOOL_NAMES = {
  CREATE: 'create_booking',
  LIST: 'list_bookings',
  CANCEL: 'cancel_booking',
  RESCHEDULE: 'reschedule_booking',
} as const;

const createBookingArgs = z.object({
  date: z.string(),
  time: z.string(),
  duration: z.coerce.number().int().positive(),
  reason: z.string(),
  name: z.string(),
  email: z.string(),
});

const listBookingsArgs = z.object({
  email: z.string().min(1),
});

const cancelBookingArgs = z.object({
  email: z.string().min(1),
  date: z.string().min(1),
  time: z.string().min(1),
  reason: z.string().nullish(),
});

const rescheduleBookingArgs = z.object({
  email: z.string().min(1),
  current_date: z.string().min(1),
  current_time: z.string().min(1),
  // function-calling models often send null for fields they leave unset
  new_date: z.string().nullish(),
  new_time: z.string().nullish(),
  new_duration: z.coerce.number().int().positive().nullish(),
});

export function createBookingTools(bookings: BookingService): RegisteredTool[] {
  return [
    defineTool({
      name: BOOKING_TOOL_NAMES.CREATE,
      description:
        'Create a booking. Durations are snapped to the nearest length the calendar accepts.',
      schema: createBookingArgs,
      parameters: {
        type: 'object',
        properties: {
          date: { type: 'string', description: 'Meeting date, YYYY-MM-DD' },
          time: { type: 'string', description: 'Meeting start time, HH:MM (24h)' },
          duration: { type: 'integer', description: 'Meeting length in minutes' },
          reason: { type: 'string', description: 'Reason for the meeting' },
          name: { type: 'string', description: 'Attendee name' },
          email: { type: 'string', description: 'Attendee email' },
        },
        required: ['date', 'time', 'duration', 'reason', 'name', 'email'],
      },
      handler: async (args) => {
        const result = await bookings.create(args);
        return result.success ? result.message : `Booking error: ${result.message}`;
      },
    }),

    defineTool({
      name: BOOKING_TOOL_NAMES.LIST,
      description: "List a user's upcoming, non-cancelled bookings",
      schema: listBookingsArgs,
      parameters: {
        type: 'object',
        properties: {
          email: { type: 'string', description: 'Email the bookings were made with' },
        },
        required: ['email'],
      },
      handler: async ({ email }) => (await bookings.list(email)).message,
    }),

    defineTool({
      name: BOOKING_TOOL_NAMES.CANCEL,
      description: 'Cancel one booking, identified by email and its local start date and time',
      schema: cancelBookingArgs,
      parameters: {
        type: 'object',
        properties: {
          email: { type: 'string', description: 'Email the booking was made with' },
          date: { type: 'string', description: 'Booking date, YYYY-MM-DD' },
          time: { type: 'string', description: 'Booking start time, HH:MM (24h)' },
          reason: { type: 'string', description: 'Optional cancellation reason' },
        },
        required: ['email', 'date', 'time'],
      },
      handler: async ({ email, date, time, reason }) =>
        (await bookings.cancel({ email, date, time, reason: reason ?? undefined })).message,
    }),

    defineTool({
      name: BOOKING_TOOL_NAMES.RESCHEDULE,
      description:
        'Move a booking and/or change its length. Give at least one of new_date, new_time, new_duration.',
      schema: rescheduleBookingArgs,
      parameters: {
        type: 'object',
        properties: {
          email: { type: 'string', description: 'Email the booking was made with' },
          current_date: { type: 'string', description: 'Current booking date, YYYY-MM-DD' },
          current_time: { type: 'string', description: 'Current booking start time, HH:MM (24h)' },
          new_date: { type: 'string', description: 'New date, YYYY-MM-DD' },
          new_time: { type: 'string', description: 'New start time, HH:MM (24h)' },
          new_duration: { type: 'integer', description: 'New length in minutes' },
        },
        required: ['email', 'current_date', 'current_time'],
      },
      handler: async (args) => {
        const result = await bookings.reschedule({
          email: args.email,
          currentDate: args.current_date,
          currentTime: args.current_time,
          newDate: args.new_date ?? undefined,
          newTime: args.new_time ?? undefined,
          newDuration: args.new_duration ?? undefined,
        });
        return result.message;
      },
    }),
  ];
}
