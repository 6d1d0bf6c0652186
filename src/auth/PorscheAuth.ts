// auth/PorscheAuth.ts
import axios from "axios";
import { CookieJar } from "tough-cookie";
import { Issuer, BaseClient, generators } from "openid-client";
import jwt from "jsonwebtoken";
import porscheAppConfig from "../porscheAppConfig.json";
import {
  CaptchaRequiredError,
  IncompleteCredentialsError,
  PorscheError,
  WrongCredentialsError,
} from "../errors";
import { oauthTokenSchema } from "../schemas";
import {
  Captcha,
  HttpClient,
  OAuthToken,
  PorscheAuthConfig,
  RequestResponse,
} from "../types";

const AUTH_BASE_URL = `https://${porscheAppConfig.authorizationServer}`;
const AUTHORIZATION_URL = `${AUTH_BASE_URL}/authorize`;
const TOKEN_URL = `${AUTH_BASE_URL}/oauth/token`;

interface AuthorizationCode {
  code: string;
  codeVerifier?: string;
}

export class PorscheAuth {
  private config: PorscheAuthConfig;
  private jar: CookieJar;
  private client: HttpClient;
  private oidcClient: BaseClient;
  private captcha?: Captcha;
  private leewaySeconds: number;
  private loginResumeDelayMs: number;
  private debugMode: boolean;
  // Shared by every caller while a login or refresh is running
  private pending?: Promise<OAuthToken>;

  constructor(config: PorscheAuthConfig, client?: HttpClient) {
    this.config = config;
    this.captcha = config.captcha;
    this.leewaySeconds = config.leewaySeconds ?? 60;
    this.loginResumeDelayMs = config.loginResumeDelayMs ?? 2500;
    this.debugMode = config.debug ?? false;

    this.jar = new CookieJar(undefined, {
      looseMode: true,
      rejectPublicSuffixes: false,
      allowSpecialUseDomain: true,
    });

    // Redirects are read from the Location header, never followed
    this.client =
      client ??
      axios.create({
        maxRedirects: 0,
        validateStatus: () => true,
        timeout: porscheAppConfig.timeoutSeconds * 1000,
      });

    const issuer = new Issuer({
      issuer: `${AUTH_BASE_URL}/`,
      authorization_endpoint: AUTHORIZATION_URL,
      token_endpoint: TOKEN_URL,
    });
    this.oidcClient = new issuer.Client({
      client_id: porscheAppConfig.clientId,
      redirect_uris: [porscheAppConfig.redirectUri],
      response_types: ["code"],
      token_endpoint_auth_method: "none",
    });
  }

  setCaptcha(captcha: Captcha) {
    this.captcha = captcha;

    return this;
  }

  /**
   * Returns a token that stays valid for at least the configured leeway,
   * refreshing or logging in again when needed.
   */
  ensureValidToken(token?: OAuthToken): Promise<OAuthToken> {
    if (!this.pending) {
      this.pending = this.resolveToken(token).finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  isExpired(token: OAuthToken): boolean | undefined {
    const expiresAt = this.getExpiresAt(token);
    if (expiresAt === undefined) return undefined;
    return expiresAt - this.leewaySeconds < Date.now() / 1000;
  }

  private async resolveToken(token?: OAuthToken): Promise<OAuthToken> {
    if (token?.access_token) {
      const expired = this.isExpired(token);
      if (expired === false) {
        return token;
      }
      if (expired && token.refresh_token) {
        const refreshed = await this.refreshToken(token.refresh_token);
        if (refreshed) {
          if (this.debugMode) {
            console.log(
              `Refreshed access token: ${refreshed.access_token.slice(0, 8)}...`,
            );
          }
          return {
            ...refreshed,
            refresh_token: refreshed.refresh_token ?? token.refresh_token,
          };
        }
        console.warn("Refresh token rejected, logging in again");
      }
    }

    return this.login();
  }

  async login(): Promise<OAuthToken> {
    if (!this.config.email || !this.config.password) {
      throw new IncompleteCredentialsError();
    }

    const { code, codeVerifier } = await this.fetchAuthorizationCode();
    const token = await this.fetchAccessToken(code, codeVerifier);
    if (this.debugMode) {
      console.log(`New access token: ${token.access_token.slice(0, 8)}...`);
    }
    return token;
  }

  async fetchAuthorizationCode(): Promise<AuthorizationCode> {
    const captcha = this.captcha;
    // A captcha answer is only good for one attempt
    this.captcha = undefined;

    if (captcha) {
      if (this.debugMode) console.log("Resuming login with captcha answer");
      const resumePath = await this.loginWithIdentifier(
        captcha.state,
        captcha.code,
        captcha.codeVerifier,
      );
      const params = await this.getAndExtractLocationParams(
        new URL(resumePath, AUTH_BASE_URL).toString(),
      );
      return {
        code: this.requireCode(params),
        codeVerifier: captcha.codeVerifier,
      };
    }

    const codeVerifier = generators.codeVerifier();
    const authorizationUrl = this.oidcClient.authorizationUrl({
      response_type: "code",
      redirect_uri: porscheAppConfig.redirectUri,
      audience: porscheAppConfig.audience,
      scope: porscheAppConfig.scope,
      state: generators.state(),
      code_challenge: generators.codeChallenge(codeVerifier),
      code_challenge_method: "S256",
    });

    if (this.debugMode) console.log("Fetching authorization code");
    const params = await this.getAndExtractLocationParams(authorizationUrl);

    const existingCode = params.get("code");
    if (existingCode) {
      if (this.debugMode) console.log("Reusing existing login session");
      return { code: existingCode, codeVerifier };
    }

    const state = params.get("state");
    if (!state) {
      throw new PorscheError("Could not fetch authorization code");
    }

    if (this.debugMode) {
      console.log("No existing login session, running identifier first flow");
    }
    const resumePath = await this.loginWithIdentifier(
      state,
      undefined,
      codeVerifier,
    );
    const resumed = await this.getAndExtractLocationParams(
      new URL(resumePath, AUTH_BASE_URL).toString(),
    );
    return { code: this.requireCode(resumed), codeVerifier };
  }

  /**
   * Posts the e-mail, then the password, to the identifier first login.
   * Resolves to the path that resumes the authorize request.
   */
  async loginWithIdentifier(
    state: string,
    captchaCode?: string,
    codeVerifier?: string,
  ): Promise<string> {
    const identifierForm: Record<string, string> = {
      state,
      username: this.config.email,
      "js-available": "true",
      "webauthn-available": "false",
      "is-brave": "false",
      "webauthn-platform-available": "false",
      action: "default",
    };
    if (captchaCode) {
      identifierForm.captcha = captchaCode;
    }

    if (this.debugMode) console.log("Submitting e-mail address");
    const identifierResponse = await this.postForm(
      `${AUTH_BASE_URL}/u/login/identifier?${new URLSearchParams({ state })}`,
      identifierForm,
    );

    if (identifierResponse.status === 401) {
      throw new WrongCredentialsError();
    }

    if (identifierResponse.status === 400) {
      const html =
        typeof identifierResponse.data === "string"
          ? identifierResponse.data
          : "";
      const captcha = this.extractCaptchaImage(html);
      if (!captcha) {
        throw new PorscheError("Login rejected without a captcha", 400);
      }
      if (this.debugMode) console.log("Captcha required");
      throw new CaptchaRequiredError(captcha, state, codeVerifier);
    }

    if (this.debugMode) console.log("Submitting password");
    const passwordResponse = await this.postForm(
      `${AUTH_BASE_URL}/u/login/password?${new URLSearchParams({ state })}`,
      {
        state,
        username: this.config.email,
        password: this.config.password,
        action: "default",
      },
    );

    if (passwordResponse.status === 400) {
      throw new WrongCredentialsError();
    }

    const resumePath = this.getHeader(passwordResponse, "location");
    if (!resumePath) {
      throw new PorscheError("Login did not return a resume location");
    }
    if (this.debugMode) console.log(`Resume at ${resumePath}`);

    await this.delay(this.loginResumeDelayMs);

    return resumePath;
  }

  async fetchAccessToken(
    code: string,
    codeVerifier?: string,
  ): Promise<OAuthToken> {
    const form: Record<string, string> = {
      client_id: porscheAppConfig.clientId,
      grant_type: "authorization_code",
      code,
      redirect_uri: porscheAppConfig.redirectUri,
    };
    if (codeVerifier) {
      form.code_verifier = codeVerifier;
    }

    if (this.debugMode) console.log("Exchanging authorization code for token");
    const response = await this.postForm(TOKEN_URL, form);
    if (!this.isSuccess(response)) {
      throw PorscheError.fromStatus(response.status ?? 0);
    }
    return this.parseToken(response.data);
  }

  /** Resolves to `null` when the refresh token itself was rejected. */
  async refreshToken(refreshToken: string): Promise<OAuthToken | null> {
    if (this.debugMode) console.log("Refreshing access token");
    const response = await this.postForm(TOKEN_URL, {
      client_id: porscheAppConfig.clientId,
      grant_type: "refresh_token",
      refresh_token: refreshToken,
    });

    if (response.status === 403) {
      return null;
    }
    if (!this.isSuccess(response)) {
      throw PorscheError.fromStatus(response.status ?? 0);
    }
    return this.parseToken(response.data);
  }

  private async getAndExtractLocationParams(
    url: string,
  ): Promise<URLSearchParams> {
    const response = await this.getRequest(url);
    const location = this.getHeader(response, "location");
    if (response.status !== 302 || !location) {
      throw new PorscheError("Could not fetch authorization code");
    }
    return new URL(location, AUTH_BASE_URL).searchParams;
  }

  private requireCode(params: URLSearchParams): string {
    const code = params.get("code");
    if (!code) {
      throw new PorscheError("Could not fetch authorization code");
    }
    return code;
  }

  private parseToken(data: unknown): OAuthToken {
    const parsed = oauthTokenSchema.safeParse(data);
    if (!parsed.success) {
      throw new PorscheError("Invalid token response");
    }
    const token = parsed.data;
    if (token.expires_in !== undefined) {
      token.expires_at = Math.floor(Date.now() / 1000) + token.expires_in;
    }
    return token;
  }

  // Falls back to the access token's own `exp` claim
  private getExpiresAt(token: OAuthToken): number | undefined {
    if (token.expires_at !== undefined) return token.expires_at;

    const decoded = jwt.decode(token.access_token);
    if (decoded && typeof decoded === "object" && typeof decoded.exp === "number") {
      return decoded.exp;
    }
    return undefined;
  }

  private getRequestHeaders(cookie: string): Record<string, string> {
    return {
      "User-Agent": porscheAppConfig.userAgent,
      "X-Client-ID": porscheAppConfig.xClientId,
      ...(cookie ? { Cookie: cookie } : {}),
    };
  }

  private async getRequest(url: string): Promise<RequestResponse> {
    const cookie = await this.jar.getCookieString(url);
    if (this.debugMode) console.log("GET URL:", url.split("?")[0]);

    const response = await this.client.get(url, {
      headers: this.getRequestHeaders(cookie),
      maxRedirects: 0,
      validateStatus: () => true,
    });

    this.processCookieHeaders(response, url);
    return response;
  }

  private async postForm(
    url: string,
    form: Record<string, string>,
  ): Promise<RequestResponse> {
    const cookie = await this.jar.getCookieString(url);
    if (this.debugMode) console.log("POST URL:", url.split("?")[0]);

    const response = await this.client.post(
      url,
      new URLSearchParams(form).toString(),
      {
        headers: {
          ...this.getRequestHeaders(cookie),
          "Content-Type": "application/x-www-form-urlencoded",
        },
        maxRedirects: 0,
        validateStatus: () => true,
      },
    );

    this.processCookieHeaders(response, url);
    return response;
  }

  private processCookieHeaders(response: RequestResponse, url: string): void {
    const setCookieHeaders = response.headers?.["set-cookie"];
    if (!Array.isArray(setCookieHeaders)) return;

    const origin = new URL(url).origin;
    for (const cookieString of setCookieHeaders) {
      if (typeof cookieString !== "string") continue;
      const name = cookieString.split("=")[0];
      try {
        this.jar.setCookieSync(cookieString, origin);
      } catch (error) {
        console.warn(`Skipping cookie ${name}:`, error);
        continue;
      }
      if (this.debugMode) {
        console.log(`Added cookie: ${name}`);
      }
    }
  }

  private getHeader(response: RequestResponse, name: string): string | undefined {
    const value = response.headers?.[name];
    return typeof value === "string" ? value : undefined;
  }

  private extractCaptchaImage(html: string): string | null {
    const tags = html.match(/<img\b[^>]*>/gi) ?? [];
    const captchaTag = tags.find((tag) => /alt=["']captcha["']/i.test(tag));
    return captchaTag ? this.getRegexMatch(captchaTag, `src=["']([^"']*)["']`) : null;
  }

  private getRegexMatch(haystack: string, regexString: string): string | null {
    const re = new RegExp(regexString);
    const r = haystack.match(re);
    return r ? r[1] : null;
  }

  private isSuccess(response: RequestResponse): boolean {
    return (
      response.status !== undefined &&
      response.status >= 200 &&
      response.status < 300
    );
  }

  private delay(ms: number) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export default PorscheAuth;
