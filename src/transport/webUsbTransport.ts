import { MS_OS_20_DESCRIPTOR_INDEX } from "../usb/msOs20.js";
import type { DescriptorTransport } from "./descriptorTransport.js";
import { type TransportResult, classifyTransportError, transportErr, transportOk } from "./transportError.js";

export const USB_REQUEST_GET_DESCRIPTOR = 0x06;
/** `(USB_DT_BOS << 8) | 0`. */
export const BOS_DESCRIPTOR_VALUE = 0x0f00;
export const WEBUSB_REQUEST_GET_URL = 0x02;

export const DEFAULT_TRANSFER_LENGTH = 512;

export type WebUsbTransportOptions = {
  /** `length` passed to every `controlTransferIn` call. */
  transferLength?: number;
};

function dataViewToUint8Array(view: DataView): Uint8Array {
  const src = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
  const out = new Uint8Array(src.byteLength);
  out.set(src);
  return out;
}

/**
 * Fetches descriptors from a WebUSB device (browser `navigator.usb` or the Node.js `usb` package's
 * `WebUSB` shim). The device must already be opened.
 */
export class WebUsbDescriptorTransport implements DescriptorTransport {
  private readonly transferLength: number;

  constructor(
    private readonly device: Pick<USBDevice, "controlTransferIn">,
    options: WebUsbTransportOptions = {},
  ) {
    this.transferLength = options.transferLength ?? DEFAULT_TRANSFER_LENGTH;
  }

  fetchBos(): Promise<TransportResult> {
    return this.controlIn({
      requestType: "standard",
      recipient: "device",
      request: USB_REQUEST_GET_DESCRIPTOR,
      value: BOS_DESCRIPTOR_VALUE,
      index: 0,
    });
  }

  fetchMsOs20(vendorCode: number): Promise<TransportResult> {
    return this.controlIn({
      requestType: "vendor",
      recipient: "device",
      request: vendorCode & 0xff,
      value: 0,
      index: MS_OS_20_DESCRIPTOR_INDEX,
    });
  }

  fetchWebUsbUrl(vendorCode: number, landingPageIndex: number): Promise<TransportResult> {
    return this.controlIn({
      requestType: "vendor",
      recipient: "device",
      request: vendorCode & 0xff,
      value: landingPageIndex & 0xff,
      index: WEBUSB_REQUEST_GET_URL,
    });
  }

  private async controlIn(setup: USBControlTransferParameters): Promise<TransportResult> {
    let result: USBInTransferResult;
    try {
      result = await this.device.controlTransferIn(setup, this.transferLength);
    } catch (err) {
      const error = classifyTransportError(err);
      return transportErr(error.kind, error.message);
    }

    switch (result.status) {
      case "ok":
        return transportOk(result.data ? dataViewToUint8Array(result.data) : new Uint8Array());
      case "stall":
        return transportErr("stall", "Device returned STALL");
      default:
        return transportErr("other", `controlTransferIn returned status: ${result.status}`);
    }
  }
}
