import { beforeEach, describe, expect, it, vi } from 'vitest';

interface FakeLog {
  _id: string;
  status: string;
  phoneNumber: string;
  message: string;
  response?: string;
  sentAt?: Date;
  save: ReturnType<typeof vi.fn>;
}

const { envMock, smsLogCreate, axiosPost, createdLogs } = vi.hoisted(() => ({
  envMock: {
    NODE_ENV: 'test',
    SHOP_NAME: 'Test Tailoring',
    SEMAPHORE_API_KEY: 'test-secret',
    SEMAPHORE_SENDER_NAME: '',
    SEMAPHORE_API_URL: 'https://sms.example.test/messages',
  },
  smsLogCreate: vi.fn(),
  axiosPost: vi.fn(),
  createdLogs: [] as FakeLog[],
}));

vi.mock('../../config/env.js', () => ({ env: envMock }));
vi.mock('../../utils/logger.js', () => ({
  logger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  smsLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
  socketLogger: { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));
vi.mock('../../models/index.js', () => ({ SmsLog: { create: smsLogCreate } }));
vi.mock('axios', () => ({ default: { post: axiosPost } }));

import { buildReadyForPickupMessage, sendSms } from './sms.service.js';
import { Types } from 'mongoose';

const customerId = new Types.ObjectId();

beforeEach(() => {
  vi.clearAllMocks();
  createdLogs.length = 0;
  envMock.SEMAPHORE_API_KEY = 'test-secret';
  envMock.SEMAPHORE_SENDER_NAME = '';
  smsLogCreate.mockImplementation(async (fields: Omit<FakeLog, '_id' | 'save'>) => {
    const log: FakeLog = { _id: `log-${createdLogs.length + 1}`, ...fields, save: vi.fn().mockResolvedValue(undefined) };
    createdLogs.push(log);
    return log;
  });
});

describe('buildReadyForPickupMessage', () => {
  it('asks for the remaining balance when one is owed', () => {
    expect(
      buildReadyForPickupMessage({
        customerName: 'Ana Cruz',
        garmentName: 'Barong Tagalog',
        orderNumber: 'ORD-1A2B3C4D',
        remainingBalance: 750,
      }),
    ).toBe(
      'Good day, Ana Cruz! Great news from Test Tailoring - your Barong Tagalog ' +
        '(Order #ORD-1A2B3C4D) is now ready for pickup! ' +
        'Please bring the remaining balance of P750.00 upon pickup. ' +
        'Thank you for trusting us! - Test Tailoring Team',
    );
  });

  it('says the order is fully paid when nothing is owed', () => {
    const message = buildReadyForPickupMessage(
      { customerName: 'Ben', garmentName: 'Pants', orderNumber: 'ORD-00000001', remainingBalance: 0 },
      'Shop',
    );
    expect(message).toBe(
      'Good day, Ben! Great news from Shop - your Pants (Order #ORD-00000001) is now ready for pickup! ' +
        'Your order is fully paid. Thank you for trusting us! - Shop Team',
    );
  });
});

describe('sendSms', () => {
  it('records a failed log and skips the gateway when no API key is configured', async () => {
    envMock.SEMAPHORE_API_KEY = '';

    const result = await sendSms({ customerId, phone: '09171234567', message: 'hello' });

    expect(result.sent).toBe(false);
    expect(axiosPost).not.toHaveBeenCalled();
    expect(createdLogs[0].status).toBe('failed');
    expect(createdLogs[0].message).toBe('API key not configured');
  });

  it('posts the normalized number and marks the log sent on HTTP 200', async () => {
    envMock.SEMAPHORE_SENDER_NAME = 'TAILOR';
    axiosPost.mockResolvedValue({ status: 200, data: [{ message_id: 1 }] });

    const result = await sendSms({ customerId, phone: '0917 123-4567', message: 'ready' });

    expect(result.sent).toBe(true);
    const [url, form] = axiosPost.mock.calls[0];
    expect(url).toBe('https://sms.example.test/messages');
    expect(form.get('apikey')).toBe('test-secret');
    expect(form.get('number')).toBe('639171234567');
    expect(form.get('message')).toBe('ready');
    expect(form.get('sendername')).toBe('TAILOR');

    const log = createdLogs[0];
    expect(log.phoneNumber).toBe('639171234567');
    expect(log.status).toBe('sent');
    expect(log.response).toBe('[{"message_id":1}]');
    expect(log.sentAt).toBeInstanceOf(Date);
    expect(log.save).toHaveBeenCalledTimes(1);
  });

  it('marks the log failed on a non-200 response', async () => {
    axiosPost.mockResolvedValue({ status: 401, data: 'Unauthorized' });

    const result = await sendSms({ customerId, phone: '639171234567', message: 'ready' });

    expect(result.sent).toBe(false);
    expect(createdLogs[0].status).toBe('failed');
    expect(createdLogs[0].response).toBe('Unauthorized');
    expect(createdLogs[0].sentAt).toBeUndefined();
  });

  it('marks the log failed when the request throws', async () => {
    axiosPost.mockRejectedValue(new Error('timeout of 30000ms exceeded'));

    const result = await sendSms({ customerId, phone: '639171234567', message: 'ready' });

    expect(result.sent).toBe(false);
    expect(createdLogs[0].status).toBe('failed');
    expect(createdLogs[0].response).toBe('timeout of 30000ms exceeded');
  });
});
