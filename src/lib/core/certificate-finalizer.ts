import type { AcmeApi } from '../types/acme-api.js';
import type { AcmeOrder } from '../types/order.js';
import type { IssuedCertificate } from '../types/domain.js';
import { ORDER_STATUS } from '../types/status.js';
import { FinalizeError, RestartRequiredError } from '../errors/workflow-errors.js';
import { CERTIFICATE_KEY_ALGORITHM, createAcmeCsr, exportPrivateKeyPem } from '../crypto/csr.js';
import { buildPfx, generatePassphrase, readCertificateInfo, splitPemChain } from '../crypto/certificate.js';
import { withRetry } from '../transport/retry.js';
import { debugAcme } from '../utils/debug.js';
import { fixedIntervalRetry, type PollOptions } from './validation-poller.js';

export interface CertificateFinalizerOptions {
  /** Issuer CN of the preferred chain's top certificate */
  preferredChain?: string | undefined;
}

/**
 * Key pair, CSR, finalize, chain download and PKCS#12 bundling.
 *
 * The certificate key only ever lives in memory: an order that is already
 * past `ready` when this runs cannot be completed and needs a new order.
 */
export class CertificateFinalizer {
  constructor(
    private readonly acme: AcmeApi,
    private readonly opts: CertificateFinalizerOptions = {},
  ) {}

  async finalize(order: AcmeOrder, dnsNames: string[], poll: PollOptions): Promise<IssuedCertificate> {
    if (order.status === ORDER_STATUS.PROCESSING || order.status === ORDER_STATUS.VALID) {
      throw RestartRequiredError.keyLost(order.url);
    }
    if (order.status !== ORDER_STATUS.READY) {
      throw FinalizeError.unexpectedStatus(order.url, order.status);
    }

    const csr = await createAcmeCsr(dnsNames, CERTIFICATE_KEY_ALGORITHM);
    debugAcme('finalizing %s for %j', order.url, dnsNames);

    const submitted = await this.acme.finalize(order, csr.derBase64Url);
    const issued = submitted.status === ORDER_STATUS.VALID ? submitted : await this.waitUntilValid(order.url, poll);

    const chain = await this.acme.downloadCertificate(issued, this.opts.preferredChain);
    const [leaf] = splitPemChain(chain);
    if (leaf === undefined) {
      throw new FinalizeError(`Certificate for ${order.url} is empty`, false, { orderUrl: order.url });
    }

    const info = readCertificateInfo(leaf);
    const passphrase = generatePassphrase();
    const pfx = buildPfx(chain, await exportPrivateKeyPem(csr.keys.privateKey), passphrase);

    debugAcme('issued %s thumbprint=%s expires=%s', order.url, info.thumbprint, info.notAfter.toISOString());

    return { pfx, passphrase, thumbprint: info.thumbprint, expiresOn: info.notAfter, dnsNames };
  }

  /** `processing` is retried; anything but `valid` afterwards is fatal */
  private async waitUntilValid(orderUrl: string, poll: PollOptions): Promise<AcmeOrder> {
    return withRetry(
      async () => {
        const order = await this.acme.getOrder(orderUrl);
        if (order.status === ORDER_STATUS.PROCESSING) {
          throw FinalizeError.stillProcessing(orderUrl);
        }
        if (order.status !== ORDER_STATUS.VALID) {
          throw FinalizeError.unexpectedStatus(orderUrl, order.status);
        }
        return order;
      },
      fixedIntervalRetry(poll),
      `finalize ${orderUrl}`,
    );
  }
}
