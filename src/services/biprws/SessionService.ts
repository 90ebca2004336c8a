import { Credential, DEFAULT_AUTH_MODE } from "../../types/biprws.js";
import { logger } from "../../utils/logger.js";
import { BiprwsWebApiService } from "./BiprwsWebApiService.js";
import { AuthError, BiprwsApiError, NotFoundError } from "./errors.js";
import { logonResponseSchema, readResponse } from "./responseSchemas.js";

/**
 * Obtains and revokes BIPRWS logon tokens.
 * Holds no token itself; callers pass it to every later call.
 */
export class SessionService {
  constructor(private readonly api: BiprwsWebApiService) {}

  /**
   * Log on and return the raw logon token
   *
   * @param authMode - Platform authentication type, passed through unchanged
   */
  async logon(
    credential: Credential,
    authMode: string = DEFAULT_AUTH_MODE,
  ): Promise<string> {
    logger.info(
      `Logging on to ${this.api.getBaseUrl()} as ${credential.username} (${authMode})`,
    );

    let data: unknown;
    try {
      data = await this.api.sendJson("/logon/long", {
        method: "POST",
        body: {
          userName: credential.username,
          password: credential.password,
          auth: authMode,
        },
      });
    } catch (error) {
      logger.exception("Logon failed", error, {
        component: "SessionService",
        operation: "logon",
        username: credential.username,
      });
      if (error instanceof BiprwsApiError || error instanceof NotFoundError) {
        throw new AuthError(
          `Logon as ${credential.username} was rejected: ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }

    return readResponse(logonResponseSchema, data, "logon").logonToken;
  }

  /**
   * Invalidate a logon token. The token must not be used afterwards.
   */
  async logoff(token: string): Promise<void> {
    try {
      await this.api.sendJson("/logoff", { method: "POST", token });
      logger.info("Logged off");
    } catch (error) {
      logger.exception("Logoff failed", error, {
        component: "SessionService",
        operation: "logoff",
      });
      throw error;
    }
  }
}
