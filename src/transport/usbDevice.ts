import { hex16 } from "../usb/hex.js";

/** The slice of `USBDevice` the analyzer needs once a device has been selected. */
export type UsbDeviceHandle = Pick<
  USBDevice,
  "vendorId" | "productId" | "productName" | "opened" | "open" | "close" | "controlTransferIn"
>;

export type UsbDeviceProvider = { getDevices(): Promise<UsbDeviceHandle[]> };

type OpenableUsbDevice = Pick<USBDevice, "vendorId" | "productId" | "opened" | "open">;

export class DeviceNotFoundError extends Error {
  constructor(
    readonly vendorId: number,
    readonly productId: number,
  ) {
    super(`Device not found (VID=${hex16(vendorId)}, PID=${hex16(productId)})`);
    this.name = "DeviceNotFoundError";
  }
}

/**
 * Finds the first device matching `vendorId`/`productId` and opens it.
 *
 * Throws {@link DeviceNotFoundError} when no device matches; `open()` failures propagate with the
 * original error attached as `cause`.
 */
export async function openUsbDevice<D extends OpenableUsbDevice>(
  usb: { getDevices(): Promise<D[]> },
  vendorId: number,
  productId: number,
): Promise<D> {
  const devices = await usb.getDevices();
  const device = devices.find((d) => d.vendorId === vendorId && d.productId === productId);
  if (!device) throw new DeviceNotFoundError(vendorId, productId);

  if (!device.opened) {
    try {
      await device.open();
    } catch (err) {
      throw new Error(`Failed to open device (VID=${hex16(vendorId)}, PID=${hex16(productId)})`, { cause: err });
    }
  }
  return device;
}

/**
 * Node.js WebUSB provider backed by libusb. Loaded lazily so file-only runs never load the native
 * addon.
 */
export async function createNodeWebUsb(): Promise<UsbDeviceProvider> {
  // `usb` is CommonJS; its `module.exports` arrives as the namespace's default export.
  const { default: usb } = await import("usb");
  return new usb.WebUSB({ allowAllDevices: true });
}
