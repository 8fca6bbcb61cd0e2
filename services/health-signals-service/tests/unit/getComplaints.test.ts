jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Breaker state is covered in circuitBreaker.test.ts
jest.mock('@/modules/openDataBreaker', () => ({
  openDataBreaker: {
    name: 'nyc-open-data-311',
    guard: jest.fn(),
    success: jest.fn(),
    failure: jest.fn(),
  },
}));

// Execute Bottleneck jobs immediately (no timing concerns in unit tests)
jest.mock('bottleneck', () =>
  jest.fn().mockImplementation(() => ({
    schedule: (fn: () => unknown) => fn(),
  }))
);

import { buildComplaintQuery, getComplaints } from '@/modules/getComplaints';
import { openDataBreaker } from '@/modules/openDataBreaker';
import { OPEN_DATA_URL } from '@/constants/openData';
import { createHttpClient, httpError } from '../helpers/axios';

const SINCE = new Date('2026-10-11T00:00:00.000Z');

const createRow = (overrides: Record<string, unknown> = {}) => ({
  unique_key: '61234567',
  created_date: '2026-10-17T08:15:00.000',
  agency: 'DOHMH',
  complaint_type: 'Rodent',
  descriptor: 'Rat Sighting',
  borough: 'QUEENS',
  status: 'Open',
  incident_address: '123 MAIN STREET',
  latitude: '40.7128',
  longitude: '-73.9012',
  ...overrides,
});

describe('getComplaints (unit)', () => {
  beforeEach(() => {
    jest.mocked(openDataBreaker.guard).mockReturnValue(true);
  });

  /**
   * Purpose:
   * A "Rodent" row becomes one Complaint with the
   * raw complaint type kept and the category resolved.
   */
  test('emits a complaint for a Rodent row', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({ data: [createRow()] });

    const result = await getComplaints({ http, categories: ['rodent'], since: SINCE });

    expect(result.records).toEqual([
      {
        id: '61234567',
        complaintType: 'Rodent',
        category: 'rodent',
        descriptor: 'Rat Sighting',
        borough: 'QUEENS',
        createdAt: '2026-10-17T08:15:00.000',
        status: 'Open',
        location: {
          address: '123 MAIN STREET',
          latitude: 40.7128,
          longitude: -73.9012,
        },
      },
    ]);
    expect(result.failures).toEqual([]);
    expect(openDataBreaker.success).toHaveBeenCalledTimes(1);
  });

  test('drops rows outside the configured complaint types', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({
      data: [
        createRow({ unique_key: '1', complaint_type: 'Noise - Residential' }),
        createRow({ unique_key: '2', complaint_type: 'Food Poisoning' }),
        createRow({ unique_key: '3', complaint_type: 'RODENT' }),
      ],
    });

    const result = await getComplaints({ http, categories: ['rodent'], since: SINCE });

    expect(result.records.map((c) => [c.id, c.complaintType, c.category])).toEqual([
      ['3', 'RODENT', 'rodent'],
    ]);
    expect(result.skipped).toBe(0);
  });

  test('maps sanitation and food types to their categories', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({
      data: [
        createRow({ unique_key: '1', complaint_type: 'UNSANITARY CONDITION' }),
        createRow({ unique_key: '2', complaint_type: 'Food Poisoning' }),
      ],
    });

    const result = await getComplaints({
      http,
      categories: ['rodent', 'sanitation', 'food'],
      since: SINCE,
    });

    expect(result.records.map((c) => c.category)).toEqual(['sanitation', 'food']);
  });

  test('builds a SoQL query for the configured categories', () => {
    const query = buildComplaintQuery({
      categories: ['rodent', 'food'],
      since: SINCE,
      limit: 500,
      offset: 1000,
    });

    expect(query).toEqual({
      $where:
        "upper(complaint_type) in('RODENT', 'FOOD POISONING', 'FOOD ESTABLISHMENT') AND created_date >= '2026-10-11T00:00:00'",
      $order: 'created_date DESC, unique_key',
      $limit: 500,
      $offset: 1000,
    });
  });

  /**
   * Purpose:
   * Pagination advances the offset by the page size and
   * stops at the first short page.
   */
  test('paginates until a short page is returned', async () => {
    const http = createHttpClient();
    http.get
      .mockResolvedValueOnce({ data: [createRow({ unique_key: '1' }), createRow({ unique_key: '2' })] })
      .mockResolvedValueOnce({ data: [createRow({ unique_key: '3' })] });

    const result = await getComplaints({ http, categories: ['rodent'], since: SINCE, pageSize: 2 });

    expect(http.get).toHaveBeenCalledTimes(2);
    expect(http.get.mock.calls[0][0]).toBe(OPEN_DATA_URL);
    expect(http.get.mock.calls[0][1].params.$offset).toBe(0);
    expect(http.get.mock.calls[1][1].params.$offset).toBe(2);
    expect(result.records.map((c) => c.id)).toEqual(['1', '2', '3']);
  });

  test('stops after maxPages full pages', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({ data: [createRow()] });

    await getComplaints({ http, categories: ['rodent'], since: SINCE, pageSize: 1, maxPages: 2 });

    expect(http.get).toHaveBeenCalledTimes(2);
  });

  test('skips a malformed page and continues with the next one', async () => {
    const http = createHttpClient();
    http.get
      .mockResolvedValueOnce({ data: { error: true, message: 'query timeout' } })
      .mockResolvedValueOnce({ data: [createRow({ unique_key: '9' })] });

    const result = await getComplaints({
      http,
      categories: ['rodent'],
      since: SINCE,
      pageSize: 2,
      maxPages: 3,
    });

    expect(http.get).toHaveBeenCalledTimes(2);
    expect(result.records.map((c) => c.id)).toEqual(['9']);
    expect(result.failures).toEqual([
      {
        source: 'nyc-311',
        url: OPEN_DATA_URL,
        reason: 'malformed_response',
        message: 'Page 1: Expected a JSON array of service requests',
      },
    ]);
    expect(openDataBreaker.failure).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * A rate-limited page ends pagination, keeps the records
   * already collected and counts against the breaker.
   */
  test('stops paginating when rate limited', async () => {
    const http = createHttpClient();
    const rateLimited = httpError(429);
    http.get
      .mockResolvedValueOnce({ data: [createRow({ unique_key: '1' }), createRow({ unique_key: '2' })] })
      .mockRejectedValueOnce(rateLimited);

    const result = await getComplaints({
      http,
      categories: ['rodent'],
      since: SINCE,
      pageSize: 2,
      maxPages: 5,
    });

    expect(http.get).toHaveBeenCalledTimes(2);
    expect(result.records).toHaveLength(2);
    expect(result.failures).toEqual([
      {
        source: 'nyc-311',
        url: OPEN_DATA_URL,
        reason: 'rate_limited',
        status: 429,
        message: 'Page 2: Request failed with status code 429',
      },
    ]);
    expect(openDataBreaker.failure).toHaveBeenCalledWith(rateLimited);
  });

  test('reports an open circuit without calling the API', async () => {
    jest.mocked(openDataBreaker.guard).mockReturnValue(false);
    const http = createHttpClient();

    const result = await getComplaints({ http, categories: ['rodent'], since: SINCE });

    expect(http.get).not.toHaveBeenCalled();
    expect(result.records).toEqual([]);
    expect(result.failures).toEqual([
      {
        source: 'nyc-311',
        url: OPEN_DATA_URL,
        reason: 'circuit_open',
        message: 'Skipped page 1: nyc-open-data-311 circuit open',
      },
    ]);
  });

  test('counts rows failing validation as skipped', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({
      data: [
        createRow({ unique_key: undefined }),
        createRow({ created_date: 'yesterday' }),
        createRow({ latitude: undefined, longitude: undefined, incident_address: undefined }),
      ],
    });

    const result = await getComplaints({ http, categories: ['rodent'], since: SINCE });

    expect(result.skipped).toBe(2);
    expect(result.records).toHaveLength(1);
    expect(result.records[0].location).toEqual({ address: null, latitude: null, longitude: null });
  });

  test('sends the app token header when configured', async () => {
    const http = createHttpClient();
    http.get.mockResolvedValue({ data: [] });

    await getComplaints({
      http,
      categories: ['food'],
      since: SINCE,
      baseUrl: 'https://data.example.org/resource/test.json',
      appToken: 'test-token',
    });

    expect(http.get).toHaveBeenCalledWith(
      'https://data.example.org/resource/test.json',
      expect.objectContaining({ headers: { 'X-App-Token': 'test-token' } })
    );
  });
});
