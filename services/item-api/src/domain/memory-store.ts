import type { Item, ItemFields } from "@item-registry/shared";
import type { ItemStore } from "./store.js";

export const normalizeName = (name: string): string => name.trim().toLowerCase();

const copyItem = (item: Item): Item => ({ ...item });

/**
 * Keeps items in insertion order. Ids start at 1 and are never reused, even
 * after the item holding one is deleted.
 */
export class MemoryItemStore implements ItemStore {
  private items: Item[] = [];
  private nextId = 1;

  create(fields: ItemFields): Item {
    const item: Item = { id: this.nextId, name: fields.name };
    if (fields.description !== undefined) item.description = fields.description;
    this.nextId += 1;
    this.items.push(item);
    return copyItem(item);
  }

  list(): Item[] {
    return this.items.map(copyItem);
  }

  get(itemId: number): Item | undefined {
    const item = this.items.find((candidate) => candidate.id === itemId);
    return item ? copyItem(item) : undefined;
  }

  delete(itemId: number): boolean {
    const index = this.items.findIndex((candidate) => candidate.id === itemId);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  findByName(name: string): Item | undefined {
    const normalized = normalizeName(name);
    const item = this.items.find((candidate) => normalizeName(candidate.name) === normalized);
    return item ? copyItem(item) : undefined;
  }

  size(): number {
    return this.items.length;
  }
}
