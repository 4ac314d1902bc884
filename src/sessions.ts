import { MemorySessionStorage, type StorageAdapter } from "grammy";
import { IDLE, type ActiveState, type DialogState } from "./handlers/flows";

/**
 * Per-user dialog state. Only users inside a dialog have an entry; finishing
 * or cancelling a dialog deletes it.
 */
export class SessionStore {
  constructor(
    private readonly storage: StorageAdapter<ActiveState> =
      new MemorySessionStorage<ActiveState>(),
  ) {}

  static inMemory(ttlMinutes?: number) {
    return new SessionStore(
      new MemorySessionStorage<ActiveState>(
        ttlMinutes ? ttlMinutes * 60_000 : undefined,
      ),
    );
  }

  async get(userId: number): Promise<DialogState> {
    return (await this.storage.read(String(userId))) ?? IDLE;
  }

  async set(userId: number, state: DialogState) {
    if (state.step === "idle") {
      await this.clear(userId);
    } else {
      await this.storage.write(String(userId), state);
    }
  }

  async clear(userId: number) {
    await this.storage.delete(String(userId));
  }
}
