import { PutMetricDataCommand, type CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import type { MetricSample, ParkingAction } from '../types';
import { MetricsPushError, describeError } from '../utils/errors';
import { logger, EMOJIS } from '../utils/logger';
import { ok, err, type Result } from '../utils/result';

export const METRIC_NAMES = {
    AVAILABLE_SLOTS: 'AvailableSlots',
    DAILY_CAR_COUNT: 'DailyCarCount',
    PARKING_DURATION: 'ParkingDuration',
} as const;

export interface MetricsSink {
    publish(namespace: string, samples: MetricSample[]): Promise<Result<void, MetricsPushError>>;
}

/**
 * Entries count as one car each; the dashboard sums them per day.
 * Durations are in minutes and only reported when non-zero.
 */
export function buildMetricSamples(action: ParkingAction, slotsLeft: number, durationMins: number): MetricSample[] {
    const samples: MetricSample[] = [
        { name: METRIC_NAMES.AVAILABLE_SLOTS, value: slotsLeft, unit: 'Count' },
    ];

    if (action === 'ENTRY') {
        samples.push({ name: METRIC_NAMES.DAILY_CAR_COUNT, value: 1, unit: 'Count' });
    } else if (durationMins > 0) {
        samples.push({ name: METRIC_NAMES.PARKING_DURATION, value: durationMins, unit: 'Count' });
    }

    return samples;
}

export class CloudWatchMetricsSink implements MetricsSink {
    constructor(private client: CloudWatchClient) {}

    async publish(namespace: string, samples: MetricSample[]): Promise<Result<void, MetricsPushError>> {
        try {
            await this.client.send(new PutMetricDataCommand({
                Namespace: namespace,
                MetricData: samples.map(sample => ({
                    MetricName: sample.name,
                    Value: sample.value,
                    Unit: sample.unit,
                })),
            }));
            return ok(undefined);
        } catch (error) {
            return err(new MetricsPushError(`Publishing to ${namespace} failed: ${describeError(error)}`, error));
        }
    }
}

export async function emitMetrics(
    sink: MetricsSink,
    namespace: string,
    action: ParkingAction,
    slotsLeft: number,
    durationMins: number
): Promise<void> {
    const samples = buildMetricSamples(action, slotsLeft, durationMins);
    const result = await sink.publish(namespace, samples);
    if (!result.ok) {
        logger.error(`${EMOJIS.METRICS} ${result.error.message}`);
        return;
    }
    logger.debug(`${EMOJIS.METRICS} Published ${samples.map(s => `${s.name}=${s.value}`).join(', ')}`);
}
