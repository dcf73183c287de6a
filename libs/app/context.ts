import { readFileSync } from "fs";

import { createLiveMetricProvider, type AccessTokenSource, type LiveMetricProvider, type WearableVendor } from "../adapters/wearables";
import { loadConfig, type AppConfig } from "../config";
import { DEFAULT_FIELD_MAP, createFieldMapper, extendFieldMap, loadFieldMapTable, type FieldMapper } from "../mappers/field-mapper";
import { TemplateMessageGenerator, type MessageGenerator } from "../messaging/message-generator";
import { lambdaAuditSink, type AuditSink } from "../obs/audit";
import { createMetrics, type Metrics } from "../obs/metrics";
import { DynamoEventStore } from "../store/events/dynamo";
import { MemoryEventStore } from "../store/events/memory";
import type { EventStore } from "../store/events/types";
import { DynamoSignalBuffer } from "../store/history/dynamo";
import { MemorySignalBuffer } from "../store/history/memory";
import type { SignalBuffer } from "../store/history/types";
import { errorMessage } from "../validation/errors";

/** Everything a handler needs. Stores are owned here and injected, never module globals. */
export interface AppContext {
    config: AppConfig;
    events: EventStore;
    buffer: SignalBuffer;
    mapper: FieldMapper;
    messages: MessageGenerator;
    metrics: Metrics;
    audit: AuditSink;
    clock: () => Date;
    provider(vendor: WearableVendor, tokens: AccessTokenSource): LiveMetricProvider;
}

function loadFieldMapper(path: string | undefined): FieldMapper {
    if (!path) return createFieldMapper(DEFAULT_FIELD_MAP);
    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, "utf8"));
    } catch (e) {
        throw new Error(`Cannot read field map: ${errorMessage(e)}`);
    }
    return createFieldMapper(extendFieldMap(DEFAULT_FIELD_MAP, loadFieldMapTable(data)));
}

export function createAppContext(env: NodeJS.ProcessEnv = process.env, overrides: Partial<AppContext> = {}): AppContext {
    const config = overrides.config ?? loadConfig(env);
    const baseUrls: Record<WearableVendor, string | undefined> = {
        fitbit: config.FITBIT_API_BASE,
        oura: config.OURA_API_BASE,
    };

    return {
        config,
        events: config.EVENTS_TABLE_NAME
            ? new DynamoEventStore({ tableName: config.EVENTS_TABLE_NAME })
            : new MemoryEventStore(),
        buffer: config.HISTORY_TABLE_NAME
            ? new DynamoSignalBuffer({ tableName: config.HISTORY_TABLE_NAME })
            : new MemorySignalBuffer(),
        mapper: loadFieldMapper(config.FIELD_MAP_PATH),
        messages: new TemplateMessageGenerator(),
        metrics: createMetrics(config.METRICS_NS),
        audit: lambdaAuditSink(config.AUDIT_FN_ARN),
        clock: () => new Date(),
        provider: (vendor, tokens) => createLiveMetricProvider(vendor, { tokens, baseUrl: baseUrls[vendor] }),
        ...overrides,
    };
}

let shared: AppContext | undefined;

/** Per-container context for Lambda entry points; built on first use. */
export function defaultContext(): AppContext {
    shared ??= createAppContext();
    return shared;
}
