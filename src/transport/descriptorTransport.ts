import type { TransportResult } from "./transportError.js";

/**
 * Source of the three descriptor buffers the analyzer inspects.
 *
 * Implementations never throw for transfer failures; those come back as `{ ok: false }`.
 */
export interface DescriptorTransport {
  fetchBos(): Promise<TransportResult>;
  fetchMsOs20(vendorCode: number): Promise<TransportResult>;
  fetchWebUsbUrl(vendorCode: number, landingPageIndex: number): Promise<TransportResult>;
}
