import { AuthenticationError, ValidationError } from "../errors";
import { createCredentialService, type CredentialService } from "../services/credentialService";
import { createTokenService } from "../services/tokenService";
import { INCORRECT_LOGIN_MESSAGE, UserService } from "../services/userService";
import { MemStorage } from "./helpers/memStorage";

describe("UserService", () => {
  let storage: MemStorage;
  let credentials: CredentialService;
  let users: UserService;

  beforeEach(() => {
    storage = new MemStorage();
    credentials = createCredentialService({ rounds: 4 });
    users = new UserService(storage, credentials, createTokenService({
      secretKey: "test-secret-key-with-at-least-32-characters",
      ttlSeconds: 3600,
      issuer: "vitals-api",
      audience: "vitals-clients",
    }));
  });

  describe("login", () => {
    it("runs a password comparison even when the e-mail is unknown", async () => {
      const verify = jest.spyOn(credentials, "verify");

      await expect(users.login("nobody@example.com", "pw123456")).rejects.toThrow(INCORRECT_LOGIN_MESSAGE);

      expect(verify).toHaveBeenCalledTimes(1);
      expect(verify.mock.calls[0][0]).toBe("pw123456");
      expect(verify.mock.calls[0][1]).toMatch(/^\$2[aby]\$04\$/);
    });

    it("reuses one placeholder hash across unknown e-mails", async () => {
      const hash = jest.spyOn(credentials, "hash");

      await expect(users.login("a@example.com", "pw123456")).rejects.toBeInstanceOf(AuthenticationError);
      await expect(users.login("b@example.com", "pw123456")).rejects.toBeInstanceOf(AuthenticationError);

      expect(hash).toHaveBeenCalledTimes(1);
    });

    it("issues a token for the right password", async () => {
      const user = await users.signup({ email: "Member@Example.com", password: "pw123456" });

      const issued = await users.login("member@example.com", "pw123456");

      expect(issued.token.split(".")).toHaveLength(3);
      expect(user.email).toBe("member@example.com");
    });
  });

  describe("ensureSuperuser", () => {
    it("rejects a password outside the signup policy", async () => {
      await expect(users.ensureSuperuser("admin@example.com", "x".repeat(73))).rejects.toBeInstanceOf(ValidationError);
      await expect(users.ensureSuperuser("admin@example.com", "short")).rejects.toBeInstanceOf(ValidationError);

      expect(storage.users.size).toBe(0);
    });

    it("creates an admin once", async () => {
      await users.ensureSuperuser("admin@example.com", "test-password");
      await users.ensureSuperuser("admin@example.com", "test-password");

      const admins = Array.from(storage.users.values());
      expect(admins).toHaveLength(1);
      expect(admins[0]).toMatchObject({ email: "admin@example.com", isAdmin: true, isActive: true });
    });
  });
});
