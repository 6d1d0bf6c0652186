import fs from "fs";
import path from "path";
import { storedSessionSchema } from "./schemas";
import { OAuthToken } from "./types";

/** Caches the OAuth token of one account in a JSON session file. */
class TokenStore {
  constructor(
    private filePath: string,
    private email: string,
  ) {}

  load(): OAuthToken | undefined {
    if (!fs.existsSync(this.filePath)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      console.log(`Ignoring unreadable session file ${this.filePath}:`, error);
      return undefined;
    }

    const parsed = storedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      console.log(`Ignoring malformed session file ${this.filePath}`);
      return undefined;
    }

    if (parsed.data.email.toLowerCase() !== this.email.toLowerCase()) {
      console.log(
        `Session file ${this.filePath} belongs to another account, ignoring it`,
      );
      return undefined;
    }

    return parsed.data.token;
  }

  save(token: OAuthToken): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(
      this.filePath,
      JSON.stringify({ email: this.email, token }, null, 2),
      { mode: 0o600 },
    );
    // `mode` only applies when the file is created
    fs.chmodSync(this.filePath, 0o600);
  }

  clear(): void {
    if (fs.existsSync(this.filePath)) {
      fs.unlinkSync(this.filePath);
    }
  }
}

export default TokenStore;
