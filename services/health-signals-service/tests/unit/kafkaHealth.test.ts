import { KafkaHealth } from '@/modules/kafkaHealth';

describe('KafkaHealth (unit)', () => {
  test('starts unavailable until the first connect', () => {
    const health = new KafkaHealth();

    expect(health.isAvailable()).toBe(false);
    expect(health.current()).toEqual({ state: 'connecting', downSince: null });
  });

  test('reports the previous state on every transition', () => {
    const health = new KafkaHealth();

    expect(health.markUp()).toBe('connecting');
    expect(health.markDown(new Date('2026-10-18T09:00:00.000Z'))).toBe('up');
    expect(health.markDown(new Date('2026-10-18T09:05:00.000Z'))).toBe('down');
    expect(health.markUp()).toBe('down');
  });

  test('keeps the time of the first disconnect', () => {
    const health = new KafkaHealth();
    health.markUp();

    health.markDown(new Date('2026-10-18T09:00:00.000Z'));
    health.markDown(new Date('2026-10-18T09:05:00.000Z'));

    expect(health.current()).toEqual({ state: 'down', downSince: '2026-10-18T09:00:00.000Z' });
  });
});
