import { createCredentialService } from "../services/credentialService";
import { ValidationError } from "../errors";

describe("credential service", () => {
  const credentials = createCredentialService({ rounds: 4 });

  it("verifies a password against its own hash", async () => {
    const hash = await credentials.hash("pw123456");
    expect(await credentials.verify("pw123456", hash)).toBe(true);
  });

  it("rejects a different password", async () => {
    const hash = await credentials.hash("pw123456");
    expect(await credentials.verify("pw123457", hash)).toBe(false);
    expect(await credentials.verify("", hash)).toBe(false);
  });

  it("salts every hash", async () => {
    const first = await credentials.hash("pw123456");
    const second = await credentials.hash("pw123456");
    expect(first).not.toBe(second);
    expect(first).toMatch(/^\$2[aby]\$04\$/);
  });

  it("returns false for a malformed hash instead of throwing", async () => {
    await expect(credentials.verify("pw123456", "not-a-bcrypt-hash")).resolves.toBe(false);
  });

  it("refuses to hash an empty password", async () => {
    await expect(credentials.hash("")).rejects.toBeInstanceOf(ValidationError);
  });
});
