export interface LiveConnection {
  send(payload: string): Promise<void>;
  close(): void;
}
