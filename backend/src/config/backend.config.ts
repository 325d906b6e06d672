export type DocumentStoreDriver = 'firestore' | 'postgres';

export type BackendInspection =
  | { ready: true; documentStore: DocumentStoreDriver }
  | { ready: false; problems: string[] };

type Env = Record<string, string | undefined>;

const DOCUMENT_STORE_DRIVERS: readonly DocumentStoreDriver[] = ['firestore', 'postgres'];

const REQUIRED_BY_DRIVER: Record<DocumentStoreDriver, readonly string[]> = {
  firestore: ['FIRESTORE_PROJECT_ID'],
  postgres: ['DB_HOST', 'DB_NAME'],
};

function isDriver(value: string): value is DocumentStoreDriver {
  return DOCUMENT_STORE_DRIVERS.some((driver) => driver === value);
}

/**
 * Checks that the object store and the selected document store can be built
 * from `env`. Any problem makes the recordings backend unavailable.
 */
export function inspectBackendConfig(env: Env): BackendInspection {
  const problems: string[] = [];
  const missing = (name: string) => {
    if (!env[name]?.trim()) problems.push(`${name} is not set`);
  };

  missing('GCS_BUCKET');

  const rawDriver = (env.DOCUMENT_STORE ?? 'firestore').trim().toLowerCase();
  if (!isDriver(rawDriver)) {
    problems.push(`DOCUMENT_STORE "${rawDriver}" is not supported (use ${DOCUMENT_STORE_DRIVERS.join(' or ')})`);
    return { ready: false, problems };
  }
  REQUIRED_BY_DRIVER[rawDriver].forEach(missing);

  if (problems.length > 0) return { ready: false, problems };
  return { ready: true, documentStore: rawDriver };
}
