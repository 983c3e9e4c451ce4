/**
 * Pinata IPFS publisher. Pins the payload with pinFileToIPFS and returns the
 * public gateway URL for the resulting CID.
 */

import { RelayError } from "../errors.js";
import type { ArtifactPublisher } from "./publisher.js";

export const DEFAULT_PINATA_GATEWAY = "https://gateway.pinata.cloud/ipfs/{CID}";

const EXTENSIONS: Record<string, string> = {
  "audio/mpeg": "mp3",
  "audio/wav": "wav",
  "text/plain": "txt",
  "application/json": "json"
};

export type PinataPublisherConfig = {
  jwt: string;
  /** Gateway template; `{CID}` is replaced by the pinned content id */
  gatewayUrl?: string;
  apiUrl?: string;
  timeoutMs?: number;
};

export class PinataPublisher implements ArtifactPublisher {
  readonly name = "pinata";
  private readonly jwt: string;
  private readonly gatewayUrl: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(config: PinataPublisherConfig) {
    if (!config.jwt) {
      throw new RelayError("BAD_REQUEST", "Pinata publisher requires a JWT");
    }
    this.jwt = config.jwt;
    this.gatewayUrl = config.gatewayUrl ?? DEFAULT_PINATA_GATEWAY;
    this.apiUrl = config.apiUrl ?? "https://api.pinata.cloud";
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  locatorFor(cid: string): string {
    return this.gatewayUrl.replace("{CID}", cid);
  }

  async publish(bytes: Uint8Array, contentType: string): Promise<string> {
    const form = new FormData();
    const filename = `artifact.${EXTENSIONS[contentType] ?? "bin"}`;
    form.append("file", new Blob([bytes], { type: contentType }), filename);

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/pinning/pinFileToIPFS`, {
        method: "POST",
        headers: { Authorization: `Bearer ${this.jwt}` },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new RelayError("PUBLISH_ERROR", `Failed to upload artifact to Pinata: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      throw new RelayError("PUBLISH_ERROR", `Pinata rejected the upload with HTTP ${response.status}`, {
        status: response.status
      });
    }

    const data: unknown = await response.json().catch(() => null);
    if (data && typeof data === "object" && "IpfsHash" in data && typeof data.IpfsHash === "string") {
      return this.locatorFor(data.IpfsHash);
    }
    throw new RelayError("PUBLISH_ERROR", "Pinata response did not include an IpfsHash");
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
