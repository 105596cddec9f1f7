/**
 * In-memory response cache owned by a single client instance.
 * Entries live as long as the cache; there is no eviction.
 */
export class ResponseCache<T> {
  private readonly entries = new Map<string, T>()

  get(key: string): T | undefined {
    return this.entries.get(key)
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  set(key: string, value: T): void {
    this.entries.set(key, value)
  }

  async remember(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key)
    if (cached !== undefined) return cached
    const value = await load()
    this.entries.set(key, value)
    return value
  }
}
