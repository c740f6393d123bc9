import * as tls from 'tls';

export interface TlsCertificateInfo {
  authorized: boolean;
  authorizationError: string | null;
  issuer: string | null;
  validFrom: string | null;
  validTo: string | null;
}

export type TlsProbeFn = (host: string, timeoutMs: number) => Promise<TlsCertificateInfo>;

// Subject fields repeat when a certificate carries several values
function firstValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  return first || null;
}

/**
 * Open a TLS connection to host:443 and read the peer certificate.
 *
 * The handshake does not reject untrusted certificates so that the issuer
 * can still be reported; `authorized` says whether the chain verified.
 * Rejects on connection errors and on timeout.
 */
export function probeTls(host: string, timeoutMs: number): Promise<TlsCertificateInfo> {
  return new Promise((resolve, reject) => {
    const socket = tls.connect({
      host,
      port: 443,
      servername: host,
      rejectUnauthorized: false, // We want to inspect even invalid certs
    });

    const timeout = setTimeout(() => {
      socket.destroy();
      reject(new Error(`TLS handshake with ${host} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('secureConnect', () => {
      clearTimeout(timeout);

      const cert = socket.getPeerCertificate();
      const issuer = cert && cert.issuer
        ? firstValue(cert.issuer.O) ?? firstValue(cert.issuer.CN)
        : null;

      const authorizationError = socket.authorizationError
        ? String(socket.authorizationError)
        : null;

      resolve({
        authorized: socket.authorized,
        authorizationError,
        issuer,
        validFrom: cert?.valid_from || null,
        validTo: cert?.valid_to || null,
      });
      socket.destroy();
    });

    socket.once('error', (error) => {
      clearTimeout(timeout);
      socket.destroy();
      reject(error);
    });
  });
}
