import * as crypto from 'crypto';
import { CipherError } from './errors';

const ALGORITHM = 'aes-256-gcm';
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const deriveKey = (passphrase: string): Buffer =>
    crypto.createHash('sha256').update(passphrase, 'utf8').digest();

/**
 * Seals `data` under a key derived from `passphrase`.
 *
 * Output is base64 of `nonce ‖ ciphertext ‖ tag`; every call draws a fresh
 * random nonce, so sealing the same data twice gives different text.
 */
export const encrypt = (data: Buffer | string, passphrase: string): string => {
    const plaintext = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    const nonce = crypto.randomBytes(NONCE_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, deriveKey(passphrase), nonce, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString('base64');
};

/**
 * Opens text produced by {@link encrypt}. Throws {@link CipherError} on bad
 * encoding, truncated input, or a tag that does not verify (wrong passphrase
 * and tampering are indistinguishable).
 */
export const decrypt = (encoded: string, passphrase: string): Buffer => {
    const text = encoded.trim();
    if (!BASE64_PATTERN.test(text)) {
        throw new CipherError('ciphertext is not valid base64');
    }

    const sealed = Buffer.from(text, 'base64');
    if (sealed.length < NONCE_LENGTH + TAG_LENGTH) {
        throw new CipherError('ciphertext too short');
    }

    const nonce = sealed.subarray(0, NONCE_LENGTH);
    const tag = sealed.subarray(sealed.length - TAG_LENGTH);
    const ciphertext = sealed.subarray(NONCE_LENGTH, sealed.length - TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, deriveKey(passphrase), nonce, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    try {
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
        throw new CipherError('message authentication failed', { cause: error });
    }
};
