import { AuthError, ProviderError, errorMessage } from "../../validation/errors";
import type { FetchLike, WearableVendor } from "./types";

export async function getJson(
    fetchImpl: FetchLike,
    vendor: WearableVendor,
    url: string,
    accessToken: string,
): Promise<unknown> {
    const res = await fetchImpl(url, { headers: { Authorization: `Bearer ${accessToken}` } });
    if (res.status === 401 || res.status === 403) {
        throw new AuthError(`${vendor} rejected the access token`, { status: res.status });
    }
    if (!res.ok) {
        const body = await res.text();
        console.error("wearable-request-failed", { vendor, status: res.status, body: body.slice(0, 200) });
        throw new ProviderError(`${vendor} request failed with status ${res.status}`, { status: res.status });
    }
    try {
        return await res.json();
    } catch (e) {
        throw new ProviderError(`${vendor} returned a body that is not JSON: ${errorMessage(e)}`);
    }
}

export function utcDay(d: Date): string {
    return d.toISOString().slice(0, 10);
}
