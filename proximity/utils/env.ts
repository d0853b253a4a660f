/**
 * Environment Variables Utility
 * Provides cached access to environment variables loaded from .env
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

class EnvironmentManager {
  private cache: Map<string, string> = new Map();

  /**
   * Get an environment variable
   */
  get(key: string): string | undefined {
    if (this.cache.has(key)) {
      return this.cache.get(key);
    }

    const value = process.env[key] || undefined;

    if (value !== undefined) {
      this.cache.set(key, value);
    }

    return value;
  }

  /**
   * Get an integer environment variable
   */
  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = parseInt(value, 10);
    return isNaN(num) ? defaultValue : num;
  }

  /**
   * Get a decimal environment variable (thresholds, cell sizes)
   */
  getFloat(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = Number(value);
    return Number.isFinite(num) ? num : defaultValue;
  }

  /**
   * Set an environment variable (for testing)
   */
  set(key: string, value: string): void {
    process.env[key] = value;
    this.cache.set(key, value);
  }

  /**
   * Remove a variable from the process and the cache (for testing)
   */
  unset(key: string): void {
    delete process.env[key];
    this.cache.delete(key);
  }
}

// Export singleton instance
const env = new EnvironmentManager();
export default env;
