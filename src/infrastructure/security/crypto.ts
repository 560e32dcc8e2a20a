import { createCipheriv, createDecipheriv, createHash, randomBytes } from "crypto";

export interface SecretCipher {
  encrypt(plain: string): string;
  decrypt(packed: string): string;
}

/**
 * AES-256-GCM no formato `iv:cipher:tag` (hex). A chave é derivada por SHA-256
 * para aceitar qualquer segredo com 32+ caracteres.
 */
export const createSecretCipher = (secret: string): SecretCipher => {
  const key = createHash("sha256").update(secret).digest();

  return {
    encrypt(plain) {
      const iv = randomBytes(12);
      const cipher = createCipheriv("aes-256-gcm", key, iv);
      const enc = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
      const tag = cipher.getAuthTag();
      return `${iv.toString("hex")}:${enc.toString("hex")}:${tag.toString("hex")}`;
    },
    decrypt(packed) {
      const [ivHex, encHex, tagHex] = packed.split(":");
      if (ivHex === undefined || encHex === undefined || tagHex === undefined) {
        throw new Error("Malformed encrypted secret");
      }
      const decipher = createDecipheriv("aes-256-gcm", key, Buffer.from(ivHex, "hex"));
      decipher.setAuthTag(Buffer.from(tagHex, "hex"));
      const dec = Buffer.concat([decipher.update(Buffer.from(encHex, "hex")), decipher.final()]);
      return dec.toString("utf8");
    },
  };
};

// Linhas antigas gravadas em texto puro continuam legíveis
export const decryptSafe = (cipher: SecretCipher, value: string): string => {
  try {
    return cipher.decrypt(value);
  } catch {
    return value;
  }
};
