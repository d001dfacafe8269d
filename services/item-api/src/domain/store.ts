import type { Item, ItemFields } from "@item-registry/shared";

export interface ItemStore {
  create(fields: ItemFields): Item;
  list(): Item[];
  get(itemId: number): Item | undefined;
  delete(itemId: number): boolean;
  findByName(name: string): Item | undefined;
  size(): number;
}
