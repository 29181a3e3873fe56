/**
 * Document Provider
 *
 * Request-scoped scratch buffer for the document being edited. Seeded
 * from the caller's content and never persisted; the caller applies the
 * resulting operations.
 */

export interface DocumentEdit {
  kind: 'write' | 'insert' | 'replace' | 'delete';
  documentId: string | null;
  position: number;
  endPosition: number;
  content: string;
}

export class DocumentProvider {
  private readonly original: string;
  private modified: string | null = null;
  private edits: DocumentEdit[] = [];

  constructor(content: string = '', readonly documentId: string | null = null) {
    this.original = content;
  }

  /**
   * Current text of a document. An empty id means the current document;
   * any other document is unknown.
   */
  getDocument(id?: string | null): string | null {
    if (!this.isCurrent(id)) return null;
    return this.modified ?? this.original;
  }

  /**
   * Replace the whole text of the current document
   */
  writeDocument(id: string | null | undefined, content: string): boolean {
    if (!this.isCurrent(id)) return false;
    this.modified = content;
    return true;
  }

  /**
   * Record a change so it can be reported as an operation
   */
  recordEdit(edit: DocumentEdit): void {
    this.edits.push(edit);
  }

  getEdits(): DocumentEdit[] {
    return [...this.edits];
  }

  getModifiedContent(): string | null {
    return this.modified;
  }

  hasModifications(): boolean {
    return this.modified !== null;
  }

  private isCurrent(id: string | null | undefined): boolean {
    return !id || id === this.documentId;
  }
}
