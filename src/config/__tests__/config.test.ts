import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from '../index';
import { ConfigError } from '../../utils/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      TABLE_NAME: 'ParkingLot',
      LOGS_TABLE_NAME: 'ParkingLogs',
      BUCKET_NAME: 'parking-lot-images',
      REGION: 'ap-southeast-1',
      LOT_ID: 'lot1',
      MAX_SPOTS: 30,
      DEBUG_MODE: true,
      CONFIDENCE_THRESHOLD: 70,
      OCR_MAX_DIMENSION: 1920,
      METRICS_NAMESPACE: 'SmartParking',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      TABLE_NAME: 'Occupancy',
      AWS_REGION: 'eu-west-1',
      MAX_SPOTS: '120',
      DEBUG_MODE: 'false',
      CONFIDENCE_THRESHOLD: '85.5',
    });

    expect(config.TABLE_NAME).toBe('Occupancy');
    expect(config.REGION).toBe('eu-west-1');
    expect(config.MAX_SPOTS).toBe(120);
    expect(config.DEBUG_MODE).toBe(false);
    expect(config.CONFIDENCE_THRESHOLD).toBe(85.5);
  });

  it('reads numbers in exponent notation as validated', () => {
    const config = loadConfig({ MAX_SPOTS: '1e2', OCR_MAX_DIMENSION: '2e3' });

    expect(config.MAX_SPOTS).toBe(100);
    expect(config.OCR_MAX_DIMENSION).toBe(2000);
  });
});

describe('validateConfig', () => {
  it('rejects non-numeric values', () => {
    expect(() => validateConfig({ OCR_MAX_DIMENSION: 'wide' })).toThrow(ConfigError);
  });

  it('rejects a lot without spots', () => {
    expect(() => validateConfig({ MAX_SPOTS: '0' }))
      .toThrow('MAX_SPOTS must be a positive integer, got 0');
  });

  it('rejects a threshold outside 0-100', () => {
    expect(() => validateConfig({ CONFIDENCE_THRESHOLD: '101' }))
      .toThrow('CONFIDENCE_THRESHOLD must be between 0 and 100, got 101');
  });
});
