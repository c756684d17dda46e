import type { GmlId } from "../types";

// gml:id is an xs:ID; every value handed out here is unique within one document
export class GmlIdRegistry {
  private readonly used = new Set<string>();

  reserve(id: string | undefined): void {
    if (id) {
      this.used.add(id);
    }
  }

  claim(id: GmlId | undefined): string | undefined {
    if (id === undefined || id === "") {
      return undefined;
    }

    const base = String(id);
    let candidate = base;
    for (let suffix = 2; this.used.has(candidate); suffix += 1) {
      candidate = `${base}.${suffix}`;
    }
    this.used.add(candidate);
    return candidate;
  }
}
