/**
 * Last signature the user saw or dismissed, per account, for one session.
 *
 * Lives only as long as the owning workflow session. It covers the window
 * where a dismissal was shown locally but the server signature never landed.
 */
export class SessionSignatureCache {
  private readonly signatures: Map<string, string> = new Map();

  get(recordId: string): string | undefined {
    return this.signatures.get(recordId);
  }

  set(recordId: string, signature: string): void {
    this.signatures.set(recordId, signature);
  }

  delete(recordId: string): boolean {
    return this.signatures.delete(recordId);
  }

  clear(): void {
    this.signatures.clear();
  }

  get size(): number {
    return this.signatures.size;
  }
}
