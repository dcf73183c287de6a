import { CloudWatchClient, PutMetricDataCommand } from "@aws-sdk/client-cloudwatch";
import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";

import { lambdaAuditSink } from "./audit";
import { CloudWatchMetrics, createMetrics, noopMetrics } from "./metrics";

const credentials = { accessKeyId: "test", secretAccessKey: "test-secret" };

afterEach(() => {
    jest.restoreAllMocks();
});

test("metrics are off without a namespace", () => {
    expect(createMetrics(undefined)).toBe(noopMetrics);
    expect(createMetrics("biosignal")).toBeInstanceOf(CloudWatchMetrics);
});

test("counts are put under the namespace with dimensions", async () => {
    const cw = new CloudWatchClient({ region: "eu-central-1", credentials });
    const inputs: unknown[] = [];
    jest.spyOn(cw, "send").mockImplementation(async (command: unknown) => {
        if (command instanceof PutMetricDataCommand) inputs.push(command.input);
        return {};
    });

    await new CloudWatchMetrics("biosignal", cw).count("rows_dropped", 2, { format: "csv" });

    expect(inputs).toEqual([
        {
            Namespace: "biosignal",
            MetricData: [{ MetricName: "rows_dropped", Value: 2, Unit: "Count", Dimensions: [{ Name: "format", Value: "csv" }] }],
        },
    ]);
});

test("a failed put is logged, not thrown", async () => {
    const cw = new CloudWatchClient({ region: "eu-central-1", credentials });
    jest.spyOn(cw, "send").mockImplementation(async () => { throw new Error("denied"); });
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    await expect(new CloudWatchMetrics("biosignal", cw).ms("upload_latency_ms", 12)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith("metric-failed", "upload_latency_ms", "denied");
});

test("audit invokes the function asynchronously, and only when configured", async () => {
    const lambda = new LambdaClient({ region: "eu-central-1", credentials });
    const sent: unknown[] = [];
    jest.spyOn(lambda, "send").mockImplementation(async (command: unknown) => {
        if (command instanceof InvokeCommand) sent.push(command.input);
        return {};
    });

    await lambdaAuditSink(undefined, lambda)({ type: "upload" });
    expect(sent).toEqual([]);

    await lambdaAuditSink("arn:aws:lambda:eu-central-1:000000000000:function:audit", lambda)({ type: "upload" });
    expect(sent).toEqual([
        {
            FunctionName: "arn:aws:lambda:eu-central-1:000000000000:function:audit",
            InvocationType: "Event",
            Payload: Buffer.from('{"type":"upload"}'),
        },
    ]);
});
