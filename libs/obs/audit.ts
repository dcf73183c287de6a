import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";

import { errorMessage } from "../validation/errors";

export type AuditSink = (payload: unknown) => Promise<void>;

/** Async invoke of the audit function; upload and check-in never wait on its outcome. */
export function lambdaAuditSink(functionArn: string | undefined, lambda: LambdaClient = new LambdaClient({})): AuditSink {
  return async payload => {
    if (!functionArn) return;
    try {
      await lambda.send(
        new InvokeCommand({
          FunctionName: functionArn,
          InvocationType: "Event",
          Payload: Buffer.from(JSON.stringify(payload)),
        })
      );
    } catch (e) {
      console.warn("audit-invoke-failed", errorMessage(e));
    }
  };
}
