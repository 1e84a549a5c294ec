// src/__tests__/delivery.test.ts

import { describe, it, expect, vi } from "vitest";
import { CalibreSmtpDelivery } from "../delivery.js";
import { DeliveryFailedError } from "../errors.js";
import type { CommandRunner } from "../exec.js";
import type { DeliveryConfig } from "../types.js";

const config: DeliveryConfig = {
  to: "reader@kindle.example",
  from: "me@example.com",
  relay: "smtp.example.com",
  port: 587,
  encryption: "TLS",
  password: "test-secret",
};

describe("Calibre SMTP delivery", () => {
  it("should mail the artifact with the bundle title as subject", async () => {
    const run = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: "", stderr: "" }));
    const delivery = new CalibreSmtpDelivery(config, "calibre-smtp", run);

    await delivery.deliver("/out/articles-2026-10-18.epub", "Articles Bundle - 2026-10-18");

    expect(run).toHaveBeenCalledWith("calibre-smtp", [
      "--attachment", "/out/articles-2026-10-18.epub",
      "--relay", "smtp.example.com",
      "--port", "587",
      "--encryption", "TLS",
      "--user", "me@example.com",
      "--password", "test-secret",
      "me@example.com",
      "reader@kindle.example",
      "Articles Bundle - 2026-10-18",
    ]);
  });

  it("should fail on a non-zero exit", async () => {
    const run: CommandRunner = async () => ({ code: 1, stdout: "", stderr: "auth rejected" });
    const delivery = new CalibreSmtpDelivery(config, "calibre-smtp", run);

    await expect(delivery.deliver("/out/a.epub", "subject")).rejects.toThrow(DeliveryFailedError);
    await expect(delivery.deliver("/out/a.epub", "subject")).rejects.toThrow(
      "Sending to reader@kindle.example failed (exit 1): auth rejected"
    );
  });
});
