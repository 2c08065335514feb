/**
 * Board view-model - the state behind one open list and its framework views
 * @module board
 */

import { BehaviorSubject, distinctUntilChanged, map, timer, type Subscription } from 'rxjs';
import type {
  FocusboardClient,
  FrameworkEntry,
  Item,
  ItemPatch,
  ListDetail,
  ListSummary,
  NewItem,
  SharedList,
} from '../client/index.js';
import {
  getLayout,
  LAYOUTS,
  nextStatus,
  partition,
  placement,
  statusOf,
  validate,
  type FrameworkKey,
  type FrameworkLayout,
} from '../frameworks/index.js';

export interface Notification {
  kind: 'error' | 'info';
  message: string;
}

export interface BoardState {
  lists: ListSummary[];
  sharedLists: SharedList[];
  currentList: ListDetail | null;
  items: Item[];
  selection: ReadonlySet<number>;
  activeFramework: FrameworkKey | null;
  frameworkData: Record<string, FrameworkEntry>;
  notification: Notification | null;
  busy: boolean;
}

/**
 * Fields needed to put a deleted item back. The restored item gets a new id;
 * its tags, comments and framework placements are not restored.
 */
export type DeletedItem = NewItem & { listId: number; completed: boolean };

export interface BoardViewModelConfig {
  /**
   * How long a notification stays before it clears itself; 0 keeps it
   * until dismissed
   * @default 4000
   */
  notificationTtlMs?: number;
}

const INITIAL_STATE: BoardState = {
  lists: [],
  sharedLists: [],
  currentList: null,
  items: [],
  selection: new Set(),
  activeFramework: null,
  frameworkData: {},
  notification: null,
  busy: false,
};

/**
 * Board view-model. Every mutation waits for the server, then reloads the
 * affected state. A failed call leaves the previous state in place and
 * raises a notification instead.
 */
export class BoardViewModel {
  private stateSubject = new BehaviorSubject<BoardState>(INITIAL_STATE);
  private notificationTimer?: Subscription;
  private notificationTtlMs: number;

  /**
   * Observable of the whole board state
   */
  public readonly state$ = this.stateSubject.asObservable();

  /**
   * Observable of the current notification only
   */
  public readonly notification$ = this.state$.pipe(
    map((state) => state.notification),
    distinctUntilChanged()
  );

  constructor(
    private client: FocusboardClient,
    config: BoardViewModelConfig = {}
  ) {
    this.notificationTtlMs = config.notificationTtlMs ?? 4000;
  }

  public get state(): BoardState {
    return this.stateSubject.value;
  }

  /**
   * Active framework's layout, if one is selected
   */
  public get layout(): FrameworkLayout | null {
    const key = this.state.activeFramework;
    return key ? getLayout(key) : null;
  }

  /**
   * Items grouped for the active framework view
   */
  public zones(): Map<string, Item[]> {
    const layout = this.layout;
    return layout ? partition(layout, this.state.items, this.state.frameworkData) : new Map<string, Item[]>();
  }

  // Loading

  async loadLists(): Promise<boolean> {
    return this.run(async () => {
      await this.refreshLists();
    });
  }

  async openList(listId: number): Promise<boolean> {
    return this.run(async () => {
      const [list, items] = await Promise.all([this.client.getList(listId), this.client.getItems(listId)]);
      const activeFramework = list.frameworks[0] ?? null;
      const frameworkData = activeFramework ? await this.client.getFrameworkData(listId, activeFramework) : {};
      this.update({ currentList: list, items, activeFramework, frameworkData, selection: new Set() });
    });
  }

  async selectFramework(key: FrameworkKey | null): Promise<boolean> {
    return this.run(async () => {
      const list = this.requireList();
      const frameworkData = key ? await this.client.getFrameworkData(list.id, key) : {};
      this.update({ activeFramework: key, frameworkData });
    });
  }

  // Items

  async addItem(item: NewItem): Promise<boolean> {
    return this.mutate((list) => this.client.createItem(list.id, item));
  }

  async updateItem(itemId: number, patch: ItemPatch): Promise<boolean> {
    return this.mutate((list) => this.client.updateItem(list.id, itemId, patch));
  }

  async toggleItem(itemId: number): Promise<boolean> {
    return this.mutate((list) => this.client.toggleItem(list.id, itemId));
  }

  /**
   * Delete an item and return what is needed to undo it
   */
  async deleteItem(itemId: number): Promise<DeletedItem | null> {
    const item = this.state.items.find((candidate) => candidate.id === itemId);
    if (!item) {
      this.notify({ kind: 'error', message: 'Item not found' });
      return null;
    }
    const ok = await this.mutate((list) => this.client.deleteItem(list.id, itemId));
    return ok
      ? {
          listId: item.listId,
          title: item.title,
          description: item.description,
          priority: item.priority,
          dueDate: item.dueDate,
          completed: item.completed,
        }
      : null;
  }

  /**
   * Re-create a deleted item from its snapshot
   */
  async undoDelete(deleted: DeletedItem): Promise<boolean> {
    return this.mutate(async () => {
      const { listId, completed, ...fields } = deleted;
      const id = await this.client.createItem(listId, fields);
      if (completed) {
        await this.client.toggleItem(listId, id);
      }
    });
  }

  async reorder(order: number[]): Promise<boolean> {
    return this.mutate((list) => this.client.reorderItems(list.id, order));
  }

  // Selection

  toggleSelection(itemId: number): void {
    const selection = new Set(this.state.selection);
    if (selection.has(itemId)) {
      selection.delete(itemId);
    } else {
      selection.add(itemId);
    }
    this.update({ selection });
  }

  selectAll(): void {
    this.update({ selection: new Set(this.state.items.map((item) => item.id)) });
  }

  clearSelection(): void {
    this.update({ selection: new Set() });
  }

  async deleteSelected(): Promise<boolean> {
    const ids = [...this.state.selection];
    return this.mutate(async (list) => {
      await this.client.bulkDeleteItems(list.id, ids);
      this.update({ selection: new Set() });
    });
  }

  async moveSelected(targetListId: number): Promise<boolean> {
    const ids = [...this.state.selection];
    return this.mutate(async (list) => {
      await this.client.bulkMoveItems(list.id, ids, targetListId);
      this.update({ selection: new Set() });
    });
  }

  // Frameworks

  async attachFramework(key: FrameworkKey): Promise<boolean> {
    return this.mutate(async (list) => {
      await this.client.attachFramework(list.id, key);
      this.update({ activeFramework: key });
    });
  }

  async detachFramework(key: FrameworkKey): Promise<boolean> {
    return this.mutate(async (list) => {
      const remaining = await this.client.detachFramework(list.id, key);
      if (this.state.activeFramework === key) {
        this.update({ activeFramework: remaining[0] ?? null });
      }
    });
  }

  /**
   * Move an item to a zone of the active category framework
   */
  async moveToZone(itemId: number, zone: string): Promise<boolean> {
    return this.mutate(async () => {
      const layout = this.requireLayout();
      if (layout.kind !== 'category') {
        throw new Error(`${layout.key} has no zones`);
      }
      await this.client.setFrameworkData(itemId, layout.key, placement(layout, zone));
    });
  }

  /**
   * Advance an item's timebox status idle → running → done → idle. The
   * current status is read from the loaded data, so timeboxing must be the
   * active framework.
   */
  async cycleTimebox(itemId: number): Promise<boolean> {
    return this.mutate(async () => {
      const layout = this.requireLayout();
      if (layout.kind !== 'timebox') {
        throw new Error(`${layout.key} has no timeboxes`);
      }
      const current = statusOf(this.state.frameworkData[String(itemId)]?.data);
      const data = validate(LAYOUTS.timeboxing, { status: nextStatus(current) });
      await this.client.setFrameworkData(itemId, 'timeboxing', data);
    });
  }

  async setTimeboxMinutes(itemId: number, minutes: number): Promise<boolean> {
    return this.mutate(async () => {
      const data = validate(LAYOUTS.timeboxing, { minutes });
      await this.client.setFrameworkData(itemId, 'timeboxing', data);
    });
  }

  // Notifications

  dismissNotification(): void {
    this.notificationTimer?.unsubscribe();
    this.notificationTimer = undefined;
    this.update({ notification: null });
  }

  /**
   * Release timers and complete the state stream
   */
  destroy(): void {
    this.notificationTimer?.unsubscribe();
    this.stateSubject.complete();
  }

  private notify(notification: Notification): void {
    this.notificationTimer?.unsubscribe();
    this.update({ notification });
    if (this.notificationTtlMs > 0) {
      this.notificationTimer = timer(this.notificationTtlMs).subscribe(() => {
        this.notificationTimer = undefined;
        this.update({ notification: null });
      });
    }
  }

  private update(patch: Partial<BoardState>): void {
    this.stateSubject.next({ ...this.state, ...patch });
  }

  private requireList(): ListDetail {
    const list = this.state.currentList;
    if (!list) {
      throw new Error('No list is open');
    }
    return list;
  }

  private requireLayout(): FrameworkLayout {
    const layout = this.layout;
    if (!layout) {
      throw new Error('No framework is active');
    }
    return layout;
  }

  private async refreshLists(): Promise<void> {
    const [lists, sharedLists] = await Promise.all([this.client.getLists(), this.client.getSharedLists()]);
    this.update({ lists, sharedLists });
  }

  private async refreshCurrentList(): Promise<void> {
    const current = this.state.currentList;
    if (!current) {
      return;
    }
    const [list, items] = await Promise.all([this.client.getList(current.id), this.client.getItems(current.id)]);
    const activeFramework =
      this.state.activeFramework && list.frameworks.includes(this.state.activeFramework)
        ? this.state.activeFramework
        : (list.frameworks[0] ?? null);
    const frameworkData = activeFramework ? await this.client.getFrameworkData(list.id, activeFramework) : {};
    const ids = new Set(items.map((item) => item.id));
    const selection = new Set([...this.state.selection].filter((id) => ids.has(id)));
    this.update({ currentList: list, items, activeFramework, frameworkData, selection });
  }

  /**
   * Run a server mutation against the open list, then reload
   */
  private async mutate(action: (list: ListDetail) => Promise<unknown>): Promise<boolean> {
    return this.run(async () => {
      await action(this.requireList());
      await this.refreshCurrentList();
      await this.refreshLists();
    });
  }

  private async run(action: () => Promise<void>): Promise<boolean> {
    this.update({ busy: true });
    try {
      await action();
      return true;
    } catch (error) {
      this.notify({ kind: 'error', message: error instanceof Error ? error.message : String(error) });
      return false;
    } finally {
      this.update({ busy: false });
    }
  }
}
