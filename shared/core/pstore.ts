export type AsyncStorageLike = {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem?(key: string): Promise<void>;
};

interface GlobalWithStorage {
  localStorage?: {
    getItem?(key: string): string | null;
    setItem?(key: string, value: string): void;
    removeItem?(key: string): void;
  };
}

export function createMemoryStorage(): AsyncStorageLike & { removeItem(key: string): Promise<void> } {
  const store = new Map<string, string>();
  return {
    async getItem(key: string): Promise<string | null> {
      return store.get(key) ?? null;
    },
    async setItem(key: string, value: string): Promise<void> {
      store.set(key, value);
    },
    async removeItem(key: string): Promise<void> {
      store.delete(key);
    },
  };
}

let backend: AsyncStorageLike | null = null;

function getGlobal(): GlobalWithStorage {
  if (typeof globalThis === 'undefined') {
    return {};
  }
  return globalThis as GlobalWithStorage;
}

function createWebStorageBackend(): AsyncStorageLike | null {
  const candidate = getGlobal().localStorage;
  if (!candidate) {
    return null;
  }
  const getItem = typeof candidate.getItem === 'function' ? candidate.getItem.bind(candidate) : null;
  const setItem = typeof candidate.setItem === 'function' ? candidate.setItem.bind(candidate) : null;
  const removeItem = typeof candidate.removeItem === 'function' ? candidate.removeItem.bind(candidate) : null;
  if (!getItem || !setItem) {
    return null;
  }
  return {
    async getItem(key: string): Promise<string | null> {
      return getItem(key);
    },
    async setItem(key: string, value: string): Promise<void> {
      setItem(key, value);
    },
    async removeItem(key: string): Promise<void> {
      removeItem?.(key);
    },
  };
}

/** Web storage when the host has it, otherwise a process-local map. */
export function resolveStorage(): AsyncStorageLike {
  if (!backend) {
    backend = createWebStorageBackend() ?? createMemoryStorage();
  }
  return backend;
}

export function __resetStorageForTests(): void {
  backend = null;
}
