import { cert, initializeApp } from "firebase-admin/app";
import {
  FieldValue,
  getFirestore,
  type Firestore,
  type Query,
} from "firebase-admin/firestore";
import { z } from "zod";
import logger from "../utils/logger.js";
import type { DocumentData } from "../types.js";
import type { HistoryStore } from "./history.js";

const serviceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

function getServiceAccount(encoded: string) {
  try {
    const buff = Buffer.from(encoded, "base64");
    const account = serviceAccountSchema.parse(
      JSON.parse(buff.toString("utf-8"))
    );
    return {
      projectId: account.project_id,
      clientEmail: account.client_email,
      privateKey: account.private_key,
    };
  } catch (error) {
    logger.error({ err: error }, "Error parsing service account");
    throw new Error("Invalid FIREBASE_SERVICE_ACCOUNT format");
  }
}

/** Initialise the default Firebase app from a base64 service account. */
export function connectFirestore(serviceAccount: string): Firestore {
  const app = initializeApp({
    credential: cert(getServiceAccount(serviceAccount)),
  });

  const db = getFirestore(app);
  db.settings({ ignoreUndefinedProperties: true });
  return db;
}

export class FirestoreHistoryStore implements HistoryStore {
  constructor(private readonly db: Firestore) {}

  async createDocument(collection: string, record: DocumentData): Promise<void> {
    const docRef = await this.db.collection(collection).add({
      ...record,
      created_at: FieldValue.serverTimestamp(),
      updated_at: FieldValue.serverTimestamp(),
    });
    logger.debug({ collection, docId: docRef.id }, "Created document");
  }

  async getDocuments(
    collection: string,
    filter: DocumentData,
    limit: number
  ): Promise<DocumentData[]> {
    let query: Query = this.db.collection(collection);
    for (const [field, value] of Object.entries(filter)) {
      query = query.where(field, "==", value);
    }

    const snapshot = await query
      .orderBy("created_at", "desc")
      .limit(limit)
      .get();
    return snapshot.docs.map((doc) => doc.data());
  }

  async ping(): Promise<void> {
    await this.db.listCollections();
  }
}
