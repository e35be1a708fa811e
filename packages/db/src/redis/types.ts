export type RedisSetOptions = {
  EX?: number;
  NX?: boolean;
};

export type RedisClient = {
  get: (key: string) => Promise<string | null> | string | null;
  set: (key: string, value: string, options?: RedisSetOptions) => Promise<'OK' | null> | 'OK' | null;
  del: (...keys: string[]) => Promise<number> | number;
  // Atomic read-and-delete (Redis >= 6.2).
  getDel: (key: string) => Promise<string | null> | string | null;
};
