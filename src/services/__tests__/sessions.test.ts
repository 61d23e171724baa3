import { describe, it, expect } from 'vitest';
import { parseSessionItem, toSessionItem } from '../sessions';
import type { SessionRecord } from '../../types';

const record: SessionRecord = {
  plate: 'JKL 555',
  entryEpoch: 1_700_000_000,
  entryTimestamp: '2023-11-14 22:13:20',
  action: 'ENTRY',
  imageUrl: 'https://test-bucket.s3.eu-west-1.amazonaws.com/entry_1700000000.jpg',
};

describe('session items', () => {
  it('keys the logs table by plate', () => {
    expect(toSessionItem(record)).toEqual({
      log_id: 'JKL 555',
      timestamp: '2023-11-14 22:13:20',
      entry_epoch: 1_700_000_000,
      action: 'ENTRY',
      image_url: 'https://test-bucket.s3.eu-west-1.amazonaws.com/entry_1700000000.jpg',
    });
  });

  it('reads back what it wrote', () => {
    expect(parseSessionItem(toSessionItem(record))).toEqual(record);
  });

  it('rejects an item without a numeric entry_epoch', () => {
    expect(parseSessionItem({ log_id: 'JKL 555', entry_epoch: '1700000000' })).toBeUndefined();
    expect(parseSessionItem({ log_id: 'JKL 555' })).toBeUndefined();
  });

  it('tolerates missing descriptive fields', () => {
    expect(parseSessionItem({ log_id: 'JKL 555', entry_epoch: 5 })).toEqual({
      plate: 'JKL 555',
      entryEpoch: 5,
      entryTimestamp: '',
      action: 'ENTRY',
      imageUrl: '',
    });
  });
});
