import fs from 'node:fs';
import admin from 'firebase-admin';

export interface FirebaseOptions {
  projectId?: string;
  serviceAccountJson?: string;
  serviceAccountPath?: string;
}

let app: admin.app.App | undefined;

function initFirebaseApp(options: FirebaseOptions): admin.app.App {
  if (app) return app;

  // Prefer explicit service account json (useful for CI and simple local setup)
  if (options.serviceAccountJson) {
    const serviceAccount = JSON.parse(options.serviceAccountJson) as admin.ServiceAccount;
    app = admin.initializeApp({
      credential: admin.credential.cert(serviceAccount),
      projectId: options.projectId
    });
    return app;
  }

  if (options.serviceAccountPath) {
    const serviceAccount = JSON.parse(
      fs.readFileSync(options.serviceAccountPath, { encoding: 'utf8' })
    ) as admin.ServiceAccount;
    app = admin.initializeApp({
      credential: admin.credential.cert(serviceAccount),
      projectId: options.projectId
    });
    return app;
  }

  // Fallback to ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS or FIRESTORE_EMULATOR_HOST)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: options.projectId
  });
  return app;
}

export function getFirestore(options: FirebaseOptions): admin.firestore.Firestore {
  return initFirebaseApp(options).firestore();
}
