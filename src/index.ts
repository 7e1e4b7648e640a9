// ENV SETUP //
import { env } from "./utils/env.js";
import logger from "./utils/logger.js";

// SERVICES //
import { createApp } from "./app.js";
import {
  connectFirestore,
  FirestoreHistoryStore,
} from "./services/firebase-admin.js";
import {
  UnavailableHistoryStore,
  type HistoryStore,
} from "./services/history.js";
import { fetchLogo } from "./services/logo.js";

function createHistoryStore(): HistoryStore {
  if (!env.FIREBASE_SERVICE_ACCOUNT) {
    logger.warn("FIREBASE_SERVICE_ACCOUNT not set, QR history disabled");
    return new UnavailableHistoryStore();
  }
  return new FirestoreHistoryStore(
    connectFirestore(env.FIREBASE_SERVICE_ACCOUNT)
  );
}

const app = createApp({
  store: createHistoryStore(),
  fetchLogo: (url) => fetchLogo(url, env.LOGO_FETCH_TIMEOUT_MS),
  historyCollection: env.FIRESTORE_HISTORY_COLLECTION,
  jsonBodyLimit: env.JSON_BODY_LIMIT,
});

app.listen(env.PORT, () => {
  logger.info(`Express server running on port ${env.PORT}`);
});
