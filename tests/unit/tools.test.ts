import { z } from 'zod';
import { defineTool, ToolRegistry } from '../../src/tools/registry';
import { BOOKING_TOOL_NAMES, createBookingTools } from '../../src/tools/booking.tools';
import { adaBooking, buildBookingStack } from '../helpers/bookingStack';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const echoTool = (name = 'echo') =>
  defineTool({
    name,
    description: 'Echo an email',
    schema: z.object({ email: z.string().min(1) }),
    parameters: {
      type: 'object',
      properties: { email: { type: 'string', description: 'Email' } },
      required: ['email'],
    },
    handler: async ({ email }) => `echo ${email}`,
  });

describe('ToolRegistry', () => {
  it('should dispatch by name', async () => {
    const registry = new ToolRegistry([echoTool()]);

    await expect(registry.invoke('echo', { email: 'ada@example.com' })).resolves.toBe('echo ada@example.com');
    expect(registry.has('echo')).toBe(true);
    expect(registry.specs().map((s) => s.name)).toEqual(['echo']);
  });

  it('should answer unknown tools with the available names', async () => {
    const registry = new ToolRegistry([echoTool('alpha'), echoTool('beta')]);

    await expect(registry.invoke('gamma', {})).resolves.toBe('Unknown tool: gamma. Available tools: alpha, beta');
  });

  it('should report invalid arguments back to the caller', async () => {
    const registry = new ToolRegistry([echoTool()]);

    await expect(registry.invoke('echo', {})).resolves.toBe('Invalid arguments for echo: email: Required');
  });

  it('should turn handler exceptions into text', async () => {
    const failing = defineTool({
      name: 'boom',
      description: 'Always fails',
      schema: z.object({}),
      parameters: { type: 'object', properties: {}, required: [] },
      handler: async () => {
        throw new Error('kaput');
      },
    });

    await expect(new ToolRegistry([failing]).invoke('boom', undefined)).resolves.toBe('Error running boom: kaput');
  });

  it('should reject bad declarations at registration', () => {
    expect(() => new ToolRegistry([echoTool('has space')])).toThrow('Invalid tool name: has space');
    expect(() => new ToolRegistry([echoTool(), echoTool()])).toThrow('Duplicate tool name: echo');

    const drifted = defineTool({
      name: 'drifted',
      description: 'Advertises a field it does not accept',
      schema: z.object({ email: z.string() }),
      parameters: {
        type: 'object',
        properties: { email: { type: 'string', description: 'Email' }, phone: { type: 'string', description: 'Phone' } },
        required: ['email'],
      },
      handler: async () => 'ok',
    });
    expect(() => new ToolRegistry([drifted])).toThrow('Tool drifted advertises [email, phone] but validates [email]');

    const undeclared = defineTool({
      name: 'undeclared',
      description: 'Requires a field it never declares',
      schema: z.object({ email: z.string() }),
      parameters: {
        type: 'object',
        properties: { email: { type: 'string', description: 'Email' } },
        required: ['email', 'date'],
      },
      handler: async () => 'ok',
    });
    expect(() => new ToolRegistry([undeclared])).toThrow('Tool undeclared requires undeclared parameters: date');
  });
});

describe('booking tools', () => {
  const registryFor = (now?: string) => {
    const stack = buildBookingStack(now);
    return { ...stack, registry: new ToolRegistry(createBookingTools(stack.bookings)) };
  };

  it('should register the four booking operations', () => {
    const { registry } = registryFor();

    expect(registry.specs().map((s) => s.name)).toEqual([
      BOOKING_TOOL_NAMES.CREATE,
      BOOKING_TOOL_NAMES.LIST,
      BOOKING_TOOL_NAMES.CANCEL,
      BOOKING_TOOL_NAMES.RESCHEDULE,
    ]);
  });

  it('should coerce a string duration when creating', async () => {
    const { api, registry } = registryFor();

    const output = await registry.invoke('create_booking', {
      date: '2099-06-15',
      time: '09:00',
      duration: '45',
      reason: 'Intro call',
      name: 'Ada',
      email: 'ada@example.com',
    });

    expect(output.startsWith('Booking created successfully.')).toBe(true);
    expect(api.requestsMatching('POST', '/bookings')[0].body).toMatchObject({
      start: '2099-06-15T09:00:00.000-04:00',
      end: '2099-06-15T09:45:00.000-04:00',
    });
  });

  it('should prefix create failures', async () => {
    const { registry } = registryFor('2099-12-31T00:00:00Z');

    const output = await registry.invoke('create_booking', {
      date: '2099-06-15',
      time: '09:00',
      duration: 30,
      reason: 'Intro call',
      name: 'Ada',
      email: 'ada@example.com',
    });

    expect(output).toBe(
      'Booking error: Cannot book a meeting in the past. Please choose a future date and time.'
    );
  });

  it('should map reschedule arguments onto the request', async () => {
    const { api, registry } = registryFor();
    api.addBooking(adaBooking());

    const output = await registry.invoke('reschedule_booking', {
      email: 'ada@example.com',
      current_date: '2099-01-10',
      current_time: '09:00',
      new_duration: 90,
    });

    expect(output.startsWith('Booking rescheduled successfully.')).toBe(true);
    expect(api.requestsMatching('PATCH', '/bookings/10')[0].body).toEqual({
      startTime: '2099-01-10T09:00:00.000-05:00',
      endTime: '2099-01-10T10:30:00.000-05:00',
    });
  });

  it('should treat null optional arguments as absent', async () => {
    const { api, registry } = registryFor();
    api.addBooking(adaBooking());

    const rescheduled = await registry.invoke('reschedule_booking', {
      email: 'ada@example.com',
      current_date: '2099-01-10',
      current_time: '09:00',
      new_date: null,
      new_time: '11:00',
      new_duration: null,
    });

    expect(rescheduled.startsWith('Booking rescheduled successfully.')).toBe(true);
    expect(api.requestsMatching('PATCH', '/bookings/10')[0].body).toEqual({
      startTime: '2099-01-10T11:00:00.000-05:00',
      endTime: '2099-01-10T11:30:00.000-05:00',
    });

    const cancelled = await registry.invoke('cancel_booking', {
      email: 'ada@example.com',
      date: '2099-01-10',
      time: '11:00',
      reason: null,
    });

    expect(cancelled).toBe(
      'Successfully cancelled booking and deleted reference for ada@example.com on 2099-01-10 at 11:00'
    );
    expect(api.requestsMatching('DELETE', '/bookings/10/cancel')[0].query).toEqual({ apiKey: 'test-api-key' });
  });

  it('should list and cancel through plain messages', async () => {
    const { api, registry } = registryFor();
    api.addBooking(adaBooking());

    await expect(registry.invoke('list_bookings', { email: 'nobody@example.com' })).resolves.toBe(
      'No bookings found for nobody@example.com.'
    );
    await expect(
      registry.invoke('cancel_booking', { email: 'ada@example.com', date: '2099-01-10', time: '09:00' })
    ).resolves.toBe('Successfully cancelled booking and deleted reference for ada@example.com on 2099-01-10 at 09:00');
  });

  it('should reject missing identifiers before any request', async () => {
    const { api, registry } = registryFor();

    const output = await registry.invoke('cancel_booking', { email: 'ada@example.com', date: '2099-01-10' });

    expect(output).toBe('Invalid arguments for cancel_booking: time: Required');
    expect(api.fetch).not.toHaveBeenCalled();
  });
});
