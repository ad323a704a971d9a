import { type PairingAuthority } from '@careline/domain';
import { createLogger } from '@careline/shared';

const logger = createLogger({ name: 'worker:credential-expiry' });

export async function runCredentialExpiryJob<Tx>(
  authority: PairingAuthority<Tx>,
  now: Date = new Date(),
): Promise<number> {
  const { expired, failed } = await authority.expirePendingCredentials(now);
  if (expired > 0 || failed > 0) {
    logger.info({ count: expired, failed }, 'Expired pending credentials');
  }
  return expired;
}
