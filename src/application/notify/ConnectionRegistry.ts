import type { LiveConnection } from "../../ports/LiveConnection";

/**
 * userId -> the one live connection currently open for that user.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<number, LiveConnection>();

  /** Registers `connection`, closing any older connection of the same user. */
  add(userId: number, connection: LiveConnection): void {
    const previous = this.connections.get(userId);
    this.connections.set(userId, connection);
    if (previous && previous !== connection) {
      previous.close();
    }
  }

  /** Removes the entry only while it still points at `connection`. */
  remove(userId: number, connection: LiveConnection): boolean {
    if (this.connections.get(userId) !== connection) return false;
    return this.connections.delete(userId);
  }

  get(userId: number): LiveConnection | undefined {
    return this.connections.get(userId);
  }

  size(): number {
    return this.connections.size;
  }

  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.close();
    }
    this.connections.clear();
  }
}
