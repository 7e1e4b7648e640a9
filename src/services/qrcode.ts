import qrImage from "qr-image";
import sharp from "sharp";
import type { OverlayOptions } from "sharp";
import type { ErrorCorrectionLevel, GenerationRequest } from "../types.js";

export interface QrStyle {
  fillColor: string;
  backColor: string;
  /** Pixels per module. */
  boxSize: number;
  /** Quiet zone, in modules. */
  border: number;
  errorCorrection: ErrorCorrectionLevel;
  rounded: boolean;
}

export interface FittedLogo {
  data: Buffer;
  width: number;
  height: number;
}

const LOGO_SCALE = 0.2;
const LOGO_PADDING = 16;
const LOGO_BACKING_ALPHA = 220 / 255;
const MIN_SOFTEN_RADIUS = 4;

export function toQrStyle(request: GenerationRequest): QrStyle {
  return {
    fillColor: request.fill_color,
    backColor: request.back_color,
    boxSize: request.box_size,
    border: request.border,
    errorCorrection: request.error_correction,
    rounded: request.rounded,
  };
}

/**
 * Rasterise a module matrix into a single-channel mask: 255 on dark
 * modules, 0 on light modules and the border.
 */
export function renderModuleMask(
  modules: ReadonlyArray<ReadonlyArray<unknown>>,
  boxSize: number,
  border: number
): { mask: Buffer; size: number } {
  const count = modules.length;
  const size = (count + border * 2) * boxSize;
  const offset = border * boxSize;
  const mask = Buffer.alloc(size * size);

  modules.forEach((row, y) => {
    const line = Buffer.alloc(size);
    row.forEach((dark, x) => {
      if (dark) {
        const start = offset + x * boxSize;
        line.fill(255, start, start + boxSize);
      }
    });
    for (let dy = 0; dy < boxSize; dy++) {
      line.copy(mask, (offset + y * boxSize + dy) * size);
    }
  });

  return { mask, size };
}

/** Gaussian blur of the mask, sigma = radius / 3 with radius >= 4. */
export async function softenMask(
  mask: Buffer,
  size: number,
  boxSize: number
): Promise<Buffer> {
  const radius = Math.max(MIN_SOFTEN_RADIUS, boxSize);
  return sharp(mask, { raw: { width: size, height: size, channels: 1 } })
    .blur(radius / 3)
    .extractChannel(0)
    .raw()
    .toBuffer();
}

/**
 * Shrink the logo into 20% of the shorter side of the code, keeping its
 * aspect ratio. Never enlarges.
 */
export async function fitLogo(
  logo: Buffer,
  width: number,
  height: number
): Promise<FittedLogo> {
  const target = Math.max(1, Math.floor(Math.min(width, height) * LOGO_SCALE));
  const { data, info } = await sharp(logo)
    .resize(target, target, { fit: "inside", withoutEnlargement: true })
    .ensureAlpha()
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}

/** Centered white backing square and the logo on top of it. */
export function logoOverlays(
  logo: FittedLogo,
  width: number,
  height: number
): OverlayOptions[] {
  const backingWidth = logo.width + LOGO_PADDING;
  const backingHeight = logo.height + LOGO_PADDING;

  return [
    {
      input: {
        create: {
          width: backingWidth,
          height: backingHeight,
          channels: 4,
          background: { r: 255, g: 255, b: 255, alpha: LOGO_BACKING_ALPHA },
        },
      },
      left: Math.floor((width - backingWidth) / 2),
      top: Math.floor((height - backingHeight) / 2),
    },
    {
      input: logo.data,
      left: Math.floor((width - logo.width) / 2),
      top: Math.floor((height - logo.height) / 2),
    },
  ];
}

/**
 * Render `content` as a styled QR code PNG.
 *
 * The code is drawn as a plate of the background color with a fill-color
 * layer on top whose alpha channel is the module mask. Corner softening
 * blurs that alpha channel; the optional logo sits centered above it all.
 */
export async function renderQrCode(
  content: string,
  style: QrStyle,
  logo?: Buffer
): Promise<Buffer> {
  const modules = qrImage.matrix(content, style.errorCorrection);
  const { mask, size } = renderModuleMask(modules, style.boxSize, style.border);
  const alpha = style.rounded
    ? await softenMask(mask, size, style.boxSize)
    : mask;

  const fillLayer = await sharp({
    create: {
      width: size,
      height: size,
      channels: 3,
      background: style.fillColor,
    },
  })
    .joinChannel(alpha, { raw: { width: size, height: size, channels: 1 } })
    .raw()
    .toBuffer();

  const layers: OverlayOptions[] = [
    {
      input: fillLayer,
      raw: { width: size, height: size, channels: 4 },
      left: 0,
      top: 0,
    },
  ];

  if (logo) {
    layers.push(...logoOverlays(await fitLogo(logo, size, size), size, size));
  }

  return sharp({
    create: {
      width: size,
      height: size,
      channels: 4,
      background: style.backColor,
    },
  })
    .composite(layers)
    .png()
    .toBuffer();
}
