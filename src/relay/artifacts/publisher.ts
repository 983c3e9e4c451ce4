import crypto from "node:crypto";
import { RelayError } from "../errors.js";

/**
 * Stores a byte payload and returns a stable, externally dereferenceable
 * locator.
 *
 * @throws RelayError PUBLISH_ERROR when the payload could not be stored.
 */
export interface ArtifactPublisher {
  readonly name: string;

  publish(bytes: Uint8Array, contentType: string): Promise<string>;
}

/**
 * In-process publisher. Locators are content addressed
 * (`memory://<sha256>`), so publishing the same bytes twice yields the same
 * locator.
 */
export class MemoryPublisher implements ArtifactPublisher {
  readonly name = "memory";
  private readonly objects = new Map<string, { bytes: Uint8Array; contentType: string }>();

  publish(bytes: Uint8Array, contentType: string): Promise<string> {
    const digest = crypto.createHash("sha256").update(bytes).digest("hex");
    const locator = `memory://${digest}`;
    this.objects.set(locator, { bytes: Uint8Array.from(bytes), contentType });
    return Promise.resolve(locator);
  }

  read(locator: string): { bytes: Uint8Array; contentType: string } {
    const entry = this.objects.get(locator);
    if (!entry) {
      throw new RelayError("NOT_FOUND", `No artifact at ${locator}`);
    }
    return entry;
  }

  get size(): number {
    return this.objects.size;
  }
}
