/**
 * Shared test fixtures.
 */

import {
  DeviceAuthConfig,
  DeviceAuthorizationResponse,
  ProviderConfig,
  SecretString,
} from "../types";
import { DeviceAuthConfigBuilder } from "../client/builder";

export const ENDPOINTS: ProviderConfig = {
  deviceAuthorizationEndpoint: "https://idp.test/oauth2/device",
  tokenEndpoint: "https://idp.test/oauth2/token",
  introspectionEndpoint: "https://idp.test/oauth2/introspect",
};

export const DEVICE_CODE_BODY = {
  device_code: "test-device-code",
  user_code: "ABCD-EFGH",
  verification_uri: "https://idp.test/device",
  verification_uri_complete: "https://idp.test/device?user_code=ABCD-EFGH",
  expires_in: 600,
  interval: 5,
};

export const TOKEN_BODY = {
  access_token: "mocking_access_token",
  refresh_token: "mocking_refresh_token",
  token_type: "bearer",
  expires_in: 86400,
};

export const PROMPT_TEXT = [
  "Open https://idp.test/device in a browser and enter the code: ABCD-EFGH",
  "Or open https://idp.test/device?user_code=ABCD-EFGH directly.",
  "",
  'Press "ENTER" after successful authentication: ',
].join("\n");

/**
 * Build a configuration with test endpoints and credentials.
 */
export function testConfig(configure?: (builder: DeviceAuthConfigBuilder) => void): DeviceAuthConfig {
  const builder = new DeviceAuthConfigBuilder()
    .provider(ENDPOINTS)
    .clientId("test-client")
    .clientSecret("test-secret");
  configure?.(builder);
  return builder.build();
}

/**
 * Build a device authorization response without a server round trip.
 */
export function deviceAuthorization(
  overrides?: Partial<Omit<DeviceAuthorizationResponse, "deviceCode">>
): DeviceAuthorizationResponse {
  return {
    deviceCode: new SecretString("test-device-code"),
    userCode: "ABCD-EFGH",
    verificationUri: "https://idp.test/device",
    verificationUriComplete: "https://idp.test/device?user_code=ABCD-EFGH",
    expiresIn: 600,
    interval: 5,
    receivedAt: 0,
    ...overrides,
  };
}
