import { cert, getApps, initializeApp, type Credential } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import { join } from "path";

function str(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Service account from FIREBASE_SERVICE_ACCOUNT_PATH (JSON key file) or
 * FIREBASE_SERVICE_ACCOUNT_KEY (the JSON itself).
 */
function getCredential(): Credential | null {
  const path = process.env.FIREBASE_SERVICE_ACCOUNT_PATH?.trim();
  if (path) {
    return cert(path.startsWith("/") ? path : join(process.cwd(), path));
  }
  const key = process.env.FIREBASE_SERVICE_ACCOUNT_KEY?.trim();
  if (key) {
    const parsed: unknown = JSON.parse(key);
    if (parsed === null || typeof parsed !== "object") {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_KEY is not a JSON object");
    }
    const account: Record<string, unknown> = { ...parsed };
    return cert({
      projectId: str(account.project_id),
      clientEmail: str(account.client_email),
      privateKey: str(account.private_key),
    });
  }
  return null;
}

let adminDb: Firestore | null = null;
let initialized = false;

/**
 * Firestore handle, created on first use. Null when the app cannot be
 * initialised (missing project, unreadable credentials).
 */
export function getAdminDb(): Firestore | null {
  if (initialized) return adminDb;
  initialized = true;

  const existing = getApps()[0];
  if (existing) {
    adminDb = getFirestore(existing);
    return adminDb;
  }

  const projectId = process.env.FIREBASE_PROJECT_ID?.trim();
  try {
    const credential = getCredential();
    if (!credential) {
      console.warn(
        "[firebase] No service account credential. Set FIREBASE_SERVICE_ACCOUNT_PATH or FIREBASE_SERVICE_ACCOUNT_KEY; falling back to application default credentials.",
        { projectId: projectId ?? "(missing)" }
      );
    }
    if (!credential && !projectId) {
      console.error("[firebase] FIREBASE_PROJECT_ID is not set");
      return null;
    }
    const app = initializeApp({
      projectId,
      ...(credential ? { credential } : {}),
    });
    adminDb = getFirestore(app);
  } catch (e) {
    console.error("[firebase] init error:", e instanceof Error ? e.message : String(e));
    adminDb = null;
  }
  return adminDb;
}
