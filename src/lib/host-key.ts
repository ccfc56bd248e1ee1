import { createHash } from 'crypto';

/**
 * How a connection decides whether the responding host is the expected one.
 *
 * `accept-any` trusts whatever host answers at the address. It is kept for
 * parity with hosts that have no recorded fingerprint and must be chosen
 * explicitly.
 */
export type HostKeyPolicy =
  | { kind: 'accept-any' }
  | { kind: 'fingerprint'; fingerprint: string };

export interface HostFingerprint {
  /** `SHA256:<base64>` without padding, as ssh-keygen prints it. */
  display: string;
  hex: string;
}

/**
 * @description Parses a SHA256 fingerprint given as `SHA256:<base64>`, bare
 * base64, or 64 hex digits (colons allowed).
 */
export function parseFingerprint(value: string): HostFingerprint {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error('Host fingerprint cannot be empty');
  }

  const hexCandidate = trimmed.replace(/:/g, '').toLowerCase();
  if (/^[0-9a-f]{64}$/.test(hexCandidate)) {
    return {
      display: displayFingerprint(Buffer.from(hexCandidate, 'hex')),
      hex: hexCandidate,
    };
  }

  const base64Candidate = trimmed.startsWith('SHA256:')
    ? trimmed.slice('SHA256:'.length)
    : trimmed;
  if (/^[A-Za-z0-9+/]+=*$/.test(base64Candidate)) {
    const digest = Buffer.from(base64Candidate, 'base64');
    if (digest.length === 32) {
      return { display: displayFingerprint(digest), hex: digest.toString('hex') };
    }
  }

  throw new Error(
    `Invalid host fingerprint "${trimmed}". Provide the SHA256 fingerprint (for example "SHA256:..." from ssh-keygen -lf)`
  );
}

export function computeFingerprint(hostKey: Buffer): HostFingerprint {
  const digest = createHash('sha256').update(hostKey).digest();
  return { display: displayFingerprint(digest), hex: digest.toString('hex') };
}

function displayFingerprint(digest: Buffer): string {
  return `SHA256:${digest.toString('base64').replace(/=+$/, '')}`;
}

/**
 * @description Builds the verifier handed to the SSH handshake. `onMismatch`
 * receives the fingerprint the host actually presented.
 */
export function createHostVerifier(
  policy: HostKeyPolicy,
  onMismatch: (received: HostFingerprint) => void = () => undefined
): (hostKey: Buffer) => boolean {
  if (policy.kind === 'accept-any') {
    return () => true;
  }

  const expected = parseFingerprint(policy.fingerprint);
  return (hostKey: Buffer) => {
    const received = computeFingerprint(hostKey);
    if (received.hex !== expected.hex) {
      onMismatch(received);
      return false;
    }
    return true;
  };
}
