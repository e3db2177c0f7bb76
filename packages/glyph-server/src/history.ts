export class SearchHistory {
  private terms: string[] = [];

  constructor(private maxSize = 20) {}

  add(term: string) {
    if (!term) return;
    this.terms = [term, ...this.terms.filter(t => t !== term)].slice(0, this.maxSize);
  }

  list(): string[] {
    return [...this.terms];
  }

  clear() {
    this.terms = [];
  }
}
