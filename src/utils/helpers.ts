import * as crypto from 'crypto';

export interface PaginationOptions {
  page?: number;
  limit?: number;
}

export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    currentPage: number;
    totalPages: number;
    totalItems: number;
    itemsPerPage: number;
    hasNext: boolean;
    hasPrevious: boolean;
  };
}

/**
 * Clamp page/limit into range and compute the row offset
 */
export const normalizePagination = (options: PaginationOptions) => {
  const page = Math.max(1, Math.floor(options.page || 1));
  const limit = Math.min(100, Math.max(1, Math.floor(options.limit || 10)));
  return { page, limit, offset: (page - 1) * limit };
};

export const paginate = <T>(
  data: T[],
  totalItems: number,
  options: PaginationOptions
): PaginatedResult<T> => {
  const { page, limit } = normalizePagination(options);
  const totalPages = Math.ceil(totalItems / limit);

  return {
    data,
    pagination: {
      currentPage: page,
      totalPages,
      totalItems,
      itemsPerPage: limit,
      hasNext: page < totalPages,
      hasPrevious: page > 1,
    },
  };
};

/**
 * Sleep utility for delays
 */
export const sleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Retry function with exponential backoff
 */
export const retryWithBackoff = async <T>(
  fn: () => Promise<T>,
  maxAttempts: number = 3,
  initialDelay: number = 1000,
  onRetry?: (error: unknown, attempt: number) => void
): Promise<T> => {
  let lastError: unknown;

  for (let i = 0; i < maxAttempts; i++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (i < maxAttempts - 1) {
        onRetry?.(error, i + 1);
        const delay = initialDelay * Math.pow(2, i);
        await sleep(delay);
      }
    }
  }

  throw lastError;
};

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export const withTimeout = <T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};

/**
 * Let pending I/O callbacks run between chunks of CPU-bound work
 */
export const yieldToEventLoop = (): Promise<void> => {
  return new Promise((resolve) => setImmediate(resolve));
};

/**
 * Generate a secure random token (hex)
 */
export const generateSecureToken = (bytes: number = 32): string => {
  return crypto.randomBytes(bytes).toString('hex');
};

/**
 * SHA-256 digest used to store secrets without keeping them
 */
export const hashSecret = (secret: string): string => {
  return crypto.createHash('sha256').update(secret, 'utf8').digest('hex');
};

/**
 * Constant-time comparison of two hex digests
 */
export const digestsMatch = (a: string, b: string): boolean => {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  if (left.length !== right.length || left.length === 0) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
};
