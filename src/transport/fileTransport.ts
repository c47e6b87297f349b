import { readFile } from "node:fs/promises";

import type { DescriptorTransport } from "./descriptorTransport.js";
import { decodeDescriptorFile } from "./hexInput.js";
import { type TransportResult, transportErr, transportOk } from "./transportError.js";

export type DescriptorFiles = {
  bos?: string;
  msOs20?: string;
  webUsbUrl?: string;
};

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Serves descriptors captured to disk (raw bytes or hex dumps), one file per descriptor.
 *
 * Vendor codes are ignored: a captured buffer answers whatever request the analyzer makes.
 */
export class FileDescriptorTransport implements DescriptorTransport {
  constructor(private readonly files: DescriptorFiles) {}

  fetchBos(): Promise<TransportResult> {
    return this.load(this.files.bos, "BOS descriptor");
  }

  fetchMsOs20(_vendorCode: number): Promise<TransportResult> {
    return this.load(this.files.msOs20, "MS OS 2.0 descriptor set");
  }

  fetchWebUsbUrl(_vendorCode: number, _landingPageIndex: number): Promise<TransportResult> {
    return this.load(this.files.webUsbUrl, "WebUSB URL descriptor");
  }

  private async load(path: string | undefined, label: string): Promise<TransportResult> {
    if (path === undefined) return transportErr("notFound", `No ${label} file given`);
    let contents: Buffer;
    try {
      contents = await readFile(path);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT") return transportErr("notFound", `${label} file not found: ${path}`);
      if (code === "EACCES" || code === "EPERM") {
        return transportErr("accessDenied", `Cannot read ${label} file: ${path}`);
      }
      return transportErr("other", `Failed to read ${label} file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return transportOk(decodeDescriptorFile(new Uint8Array(contents)));
  }
}
