// src/delivery.ts

import { DeliveryFailedError } from "./errors.js";
import { runCommand, type CommandRunner } from "./exec.js";
import type { DeliveryConfig } from "./types.js";

export interface DeliveryService {
  deliver(artifactPath: string, subject: string): Promise<void>;
}

/** Mails the artifact through an SMTP relay with calibre's `calibre-smtp`. */
export class CalibreSmtpDelivery implements DeliveryService {
  constructor(
    private readonly config: DeliveryConfig,
    private readonly bin = "calibre-smtp",
    private readonly run: CommandRunner = runCommand
  ) {}

  args(artifactPath: string, subject: string): string[] {
    const c = this.config;
    return [
      "--attachment", artifactPath,
      "--relay", c.relay,
      "--port", String(c.port),
      "--encryption", c.encryption,
      "--user", c.from,
      "--password", c.password,
      c.from,
      c.to,
      subject,
    ];
  }

  async deliver(artifactPath: string, subject: string): Promise<void> {
    const result = await this.run(this.bin, this.args(artifactPath, subject));
    if (result.code !== 0) {
      throw new DeliveryFailedError(`Sending to ${this.config.to} failed (exit ${result.code})`, result.stderr);
    }
  }
}
