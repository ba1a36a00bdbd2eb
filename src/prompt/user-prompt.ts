/**
 * User Prompt
 *
 * Text shown to the person logging in while the device grant is pending.
 */

import * as QRCode from "qrcode";
import type { DeviceAuthorizationResponse } from "../types";

/**
 * Final line of the prompt; the login waits for a line of input after it.
 */
export const ENTER_PROMPT = 'Press "ENTER" after successful authentication: ';

/**
 * Renders `data` as a terminal QR code.
 */
export type QrRenderer = (data: string) => Promise<string>;

/**
 * QR renderer using UTF-8 block characters.
 */
export const utf8QrRenderer: QrRenderer = (data) => QRCode.toString(data, { type: "utf8" });

/**
 * Options for {@link renderUserPrompt}.
 */
export interface UserPromptOptions {
  /** Include a QR code of the verification URI */
  qr?: boolean;
  /** QR renderer, defaults to {@link utf8QrRenderer} */
  qrRenderer?: QrRenderer;
  /** Replaces {@link ENTER_PROMPT} */
  message?: string;
}

/**
 * Render the verification instructions for a device code.
 *
 * The QR code encodes `verification_uri_complete` when the server sent
 * one, so scanning it skips typing the user code.
 */
export async function renderUserPrompt(
  response: DeviceAuthorizationResponse,
  options?: UserPromptOptions
): Promise<string> {
  const lines = [
    `Open ${response.verificationUri} in a browser and enter the code: ${response.userCode}`,
  ];

  if (response.verificationUriComplete) {
    lines.push(`Or open ${response.verificationUriComplete} directly.`);
  }

  if (options?.qr) {
    const render = options.qrRenderer ?? utf8QrRenderer;
    const qr = await render(response.verificationUriComplete ?? response.verificationUri);
    lines.push("", qr.trimEnd());
  }

  lines.push("", options?.message ?? ENTER_PROMPT);
  return lines.join("\n");
}
