import axios from "axios";
import sharp from "sharp";
import logger from "../utils/logger.js";
import { attempt, type Result } from "../utils/result.js";

export const LOGO_FETCH_TIMEOUT_MS = 6000;
export const LOGO_MAX_BYTES = 5 * 1024 * 1024;

export type LogoFetcher = (url: string) => Promise<Result<Buffer>>;

/**
 * Download an image and re-encode it as RGBA PNG.
 * Resolves to a failed Result on network errors, timeouts, non-2xx
 * responses, bodies over `maxBytes` or bytes that don't decode as an image.
 */
export async function fetchLogo(
  url: string,
  timeout: number = LOGO_FETCH_TIMEOUT_MS,
  maxBytes: number = LOGO_MAX_BYTES
): Promise<Result<Buffer>> {
  return attempt(async () => {
    const startTime = Date.now();
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: "arraybuffer",
      timeout,
      maxContentLength: maxBytes,
    });

    const decoded = await sharp(Buffer.from(response.data))
      .ensureAlpha()
      .png()
      .toBuffer();

    logger.debug(
      { url, bytes: decoded.length, duration: Date.now() - startTime },
      "Fetched logo"
    );
    return decoded;
  });
}
