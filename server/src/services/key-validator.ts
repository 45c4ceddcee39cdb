import { hashApiKey, isApiKeyFormat } from "../utils/crypto";
import { AuthorizationError } from "./errors";
import { Device, FirmwareStore, ProjectMember } from "./firmware-store";

function presentedKeyHash(presented: string | undefined): string | null {
  const key = presented?.trim() ?? "";
  if (key.length === 0 || !isApiKeyFormat(key)) {
    return null;
  }
  return hashApiKey(key);
}

/**
 * Resolves presented API keys to the entity they are bound to. Every failure
 * (absent, malformed, unknown, revoked) is the same AuthorizationError.
 */
export class KeyValidator {
  constructor(private readonly store: FirmwareStore) {}

  async resolveDevice(presented: string | undefined): Promise<Device> {
    const secretHash = presentedKeyHash(presented);
    const device = secretHash ? await this.store.findDeviceByApiKeyHash(secretHash) : null;
    if (!device) {
      throw new AuthorizationError();
    }
    return device;
  }

  async resolveMember(presented: string | undefined): Promise<ProjectMember> {
    const secretHash = presentedKeyHash(presented);
    const member = secretHash ? await this.store.findMemberByApiKeyHash(secretHash) : null;
    if (!member) {
      throw new AuthorizationError();
    }
    return member;
  }
}
