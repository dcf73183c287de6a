import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";

import { errorMessage } from "../validation/errors";

type Dimensions = Record<string, string>;

export interface Metrics {
    count(name: string, value?: number, d?: Dimensions): Promise<void>;
    ms(name: string, ms: number, d?: Dimensions): Promise<void>;
}

function dims(d: Dimensions | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

/** Best effort: a failed put is logged and never reaches the caller. */
export class CloudWatchMetrics implements Metrics {
    constructor(
        private readonly namespace: string,
        private readonly cw: CloudWatchClient = new CloudWatchClient({}),
    ) {}

    count(name: string, value = 1, d?: Dimensions) {
        return this.put(name, value, "Count", d);
    }

    ms(name: string, ms: number, d?: Dimensions) {
        return this.put(name, ms, "Milliseconds", d);
    }

    private async put(name: string, value: number, unit: StandardUnit, d?: Dimensions) {
        try {
            await this.cw.send(new PutMetricDataCommand({
                Namespace: this.namespace,
                MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
            }));
        } catch (e) { console.warn("metric-failed", name, errorMessage(e)); }
    }
}

export const noopMetrics: Metrics = {
    async count() {},
    async ms() {},
};

export function createMetrics(namespace: string | undefined): Metrics {
    return namespace ? new CloudWatchMetrics(namespace) : noopMetrics;
}
