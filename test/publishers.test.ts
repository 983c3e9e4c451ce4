import { describe, expect, it, vi, afterEach } from "vitest";
import crypto from "node:crypto";
import { PinataPublisher } from "../src/relay/artifacts/pinata.js";
import { MemoryPublisher } from "../src/relay/artifacts/publisher.js";
import { RelayError } from "../src/relay/errors.js";

describe("MemoryPublisher", () => {
  it("returns content-addressed locators", async () => {
    const publisher = new MemoryPublisher();
    const bytes = new TextEncoder().encode("audio");

    const first = await publisher.publish(bytes, "audio/mpeg");
    const second = await publisher.publish(bytes, "audio/mpeg");

    expect(first).toBe(`memory://${crypto.createHash("sha256").update("audio").digest("hex")}`);
    expect(second).toBe(first);
    expect(publisher.size).toBe(1);
    expect(publisher.read(first).contentType).toBe("audio/mpeg");
  });

  it("throws NOT_FOUND for unknown locators", () => {
    expect(() => new MemoryPublisher().read("memory://nothing")).toThrow("No artifact at memory://nothing");
  });
});

describe("PinataPublisher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requires a JWT", () => {
    expect(() => new PinataPublisher({ jwt: "" })).toThrow("Pinata publisher requires a JWT");
  });

  it("pins the bytes and returns the gateway URL", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ IpfsHash: "bafy-test" }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);
    const publisher = new PinataPublisher({ jwt: "test-secret", apiUrl: "http://pinata.test" });

    const locator = await publisher.publish(new Uint8Array([1, 2]), "audio/mpeg");

    expect(locator).toBe("https://gateway.pinata.cloud/ipfs/bafy-test");
    const call = fetchMock.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(url).toBe("http://pinata.test/pinning/pinFileToIPFS");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret" });
    expect(init?.body).toBeInstanceOf(FormData);
  });

  it("uses a custom gateway template", () => {
    const publisher = new PinataPublisher({ jwt: "test-secret", gatewayUrl: "https://ipfs.example.test/{CID}?download=1" });
    expect(publisher.locatorFor("cid-1")).toBe("https://ipfs.example.test/cid-1?download=1");
  });

  it("throws PUBLISH_ERROR on a rejected upload", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("unauthorized", { status: 401 })));
    const publisher = new PinataPublisher({ jwt: "test-secret" });

    const err = await publisher.publish(new Uint8Array([1]), "audio/mpeg").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RelayError);
    if (err instanceof RelayError) {
      expect(err.code).toBe("PUBLISH_ERROR");
      expect(err.message).toBe("Pinata rejected the upload with HTTP 401");
    }
  });

  it("throws PUBLISH_ERROR when the network fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("getaddrinfo ENOTFOUND");
      })
    );
    const publisher = new PinataPublisher({ jwt: "test-secret" });

    await expect(publisher.publish(new Uint8Array([1]), "audio/mpeg")).rejects.toThrow(
      "Failed to upload artifact to Pinata: getaddrinfo ENOTFOUND"
    );
  });

  it("throws PUBLISH_ERROR when the response has no IpfsHash", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(JSON.stringify({}), { status: 200 })));
    const publisher = new PinataPublisher({ jwt: "test-secret" });

    await expect(publisher.publish(new Uint8Array([1]), "audio/mpeg")).rejects.toThrow(
      "Pinata response did not include an IpfsHash"
    );
  });
});
