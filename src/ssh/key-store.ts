import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { utils } from "ssh2";
import { ConfigurationError } from "../host/errors.js";

export const PRIVATE_KEY_FILE = "id_rsa";
export const PUBLIC_KEY_FILE = "id_rsa.pub";

/** Local SSH material for a host, kept in the host's store directory. */
export interface SshKeyStore {
  generate(storePath: string, comment?: string): Promise<void>;
  readPublicKey(storePath: string): Promise<string>;
}

/** RSA keys in OpenSSH format, written as id_rsa / id_rsa.pub. */
export class FileSshKeyStore implements SshKeyStore {
  constructor(private readonly bits = 2048) {}

  async generate(storePath: string, comment?: string): Promise<void> {
    const pair = utils.generateKeyPairSync("rsa", { bits: this.bits, comment });
    await mkdir(storePath, { recursive: true });
    await writeFile(join(storePath, PRIVATE_KEY_FILE), pair.private, { mode: 0o600 });
    await writeFile(join(storePath, PUBLIC_KEY_FILE), `${pair.public}\n`, { mode: 0o644 });
  }

  async readPublicKey(storePath: string): Promise<string> {
    const path = join(storePath, PUBLIC_KEY_FILE);
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      throw new ConfigurationError(`Cannot read public key ${path}`, { cause: err });
    }
  }
}
