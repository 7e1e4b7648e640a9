import type { Express } from "express";
import type { Server } from "http";
import sharp from "sharp";
import type { HistoryStore } from "../src/services/history.js";
import type { DocumentData } from "../src/types.js";

/**
 * In-memory stand-in for the document store. Newest documents come
 * back first, like the Firestore-backed store.
 */
export class MemoryHistoryStore implements HistoryStore {
  readonly documents: { collection: string; record: DocumentData }[] = [];

  async createDocument(collection: string, record: DocumentData): Promise<void> {
    this.documents.push({ collection, record });
  }

  async getDocuments(
    collection: string,
    filter: DocumentData,
    limit: number
  ): Promise<DocumentData[]> {
    return this.documents
      .filter(
        (doc) =>
          doc.collection === collection &&
          Object.entries(filter).every(([key, value]) => doc.record[key] === value)
      )
      .map((doc) => doc.record)
      .reverse()
      .slice(0, limit);
  }

  async ping(): Promise<void> {}
}

export class FailingHistoryStore implements HistoryStore {
  async createDocument(): Promise<void> {
    throw new Error("connection refused");
  }

  async getDocuments(): Promise<DocumentData[]> {
    throw new Error("connection refused");
  }

  async ping(): Promise<void> {
    throw new Error("connection refused");
  }
}

/** Store whose writes never settle, like a stalled database. */
export class StalledHistoryStore extends MemoryHistoryStore {
  async createDocument(): Promise<void> {
    return new Promise<void>(() => {});
  }
}

export interface Listening {
  url: string;
  close: () => Promise<void>;
}

/** Start `app` on an ephemeral loopback port. */
export async function listen(app: Express): Promise<Listening> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, "127.0.0.1", () => resolve(started));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export async function solidPng(
  width: number,
  height: number,
  color: string
): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: color },
  })
    .png()
    .toBuffer();
}

export interface DecodedImage {
  width: number;
  height: number;
  pixel: (x: number, y: number) => [number, number, number, number];
  colors: () => Set<string>;
}

/** Decode a PNG into RGBA pixels. */
export async function decode(png: Buffer): Promise<DecodedImage> {
  const { data, info } = await sharp(png)
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const pixel = (x: number, y: number): [number, number, number, number] => {
    const i = (y * info.width + x) * 4;
    return [data[i], data[i + 1], data[i + 2], data[i + 3]];
  };

  return {
    width: info.width,
    height: info.height,
    pixel,
    colors: () => {
      const seen = new Set<string>();
      for (let i = 0; i < data.length; i += 4) {
        seen.add(`${data[i]},${data[i + 1]},${data[i + 2]},${data[i + 3]}`);
      }
      return seen;
    },
  };
}
