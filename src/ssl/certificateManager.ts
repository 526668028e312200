import { readFile } from "node:fs/promises";
import type { SecureContextOptions } from "node:tls";
import { ConfigError, toError } from "../core/errors";
import type { TlsCredentials } from "../core/models";

export class CertificateManager {
  async loadCertificate(certPath: string, keyPath: string): Promise<TlsCredentials> {
    const cert = await this.readPem(certPath, "certificate");
    const key = await this.readPem(keyPath, "key");
    return { cert, key };
  }

  getDefaultSSLOptions(): SecureContextOptions {
    return {
      minVersion: "TLSv1.2",
      honorCipherOrder: true,
    };
  }

  private async readPem(path: string, label: "certificate" | "key"): Promise<Buffer> {
    try {
      return await readFile(path);
    } catch (err) {
      throw new ConfigError(`failed to read TLS ${label} from ${path}: ${toError(err).message}`);
    }
  }
}
