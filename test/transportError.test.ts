import { describe, expect, it } from "vitest";

import { classifyTransportError, describeTransportError } from "../src/transport/transportError.js";

describe("transport/classifyTransportError", () => {
  it("maps WebUSB DOMException names", () => {
    expect(classifyTransportError({ name: "NetworkError", message: "A transfer error has occurred." })).toEqual({
      kind: "disconnected",
      message: "A transfer error has occurred.",
    });
    expect(classifyTransportError({ name: "SecurityError", message: "Access denied." }).kind).toBe("accessDenied");
    expect(classifyTransportError({ name: "NotFoundError", message: "gone" }).kind).toBe("notFound");
  });

  it("maps libusb error text", () => {
    expect(classifyTransportError(new Error("LIBUSB_ERROR_PIPE")).kind).toBe("stall");
    expect(classifyTransportError(new Error("LIBUSB_ERROR_TIMEOUT")).kind).toBe("timeout");
    expect(classifyTransportError(new Error("LIBUSB_ERROR_NO_DEVICE")).kind).toBe("disconnected");
    expect(classifyTransportError(new Error("LIBUSB_ERROR_ACCESS")).kind).toBe("accessDenied");
    expect(classifyTransportError(new Error("LIBUSB_ERROR_NOT_SUPPORTED")).kind).toBe("unsupported");
  });

  it("follows the cause chain but keeps the outer message", () => {
    const err = new Error("controlTransferIn failed", { cause: new Error("LIBUSB_ERROR_ACCESS") });
    expect(classifyTransportError(err)).toEqual({ kind: "accessDenied", message: "controlTransferIn failed" });
  });

  it("falls back to other with a single-line message", () => {
    expect(classifyTransportError(new Error("something\nodd"))).toEqual({ kind: "other", message: "something odd" });
    expect(classifyTransportError(42)).toEqual({ kind: "other", message: "42" });
  });
});

describe("transport/describeTransportError", () => {
  it("explains stalls", () => {
    const explanation = describeTransportError({ kind: "stall", message: "Device returned STALL" });
    expect(explanation.title).toBe("Device returned STALL");
    expect(explanation.hints[0]).toBe(
      "The device likely does not support this request, or the vendor code is incorrect.",
    );
  });

  it("has no hints for missing descriptors", () => {
    expect(describeTransportError({ kind: "notFound", message: "x" })).toEqual({
      title: "Descriptor not available",
      hints: [],
    });
  });
});
