// Anything with write(), normally an express Response held open.
export type SseSink = {
  write: (chunk: string) => unknown;
};

type Client = {
  id: number;
  res: SseSink;
};

export class SseHub<T> {
  private clients = new Map<number, Client>();
  private seq = 0;

  addClient(res: SseSink): number {
    const id = ++this.seq;
    this.clients.set(id, { id, res });
    return id;
  }

  removeClient(id: number) {
    this.clients.delete(id);
  }

  get size() {
    return this.clients.size;
  }

  send(res: SseSink, event: string, data: unknown) {
    res.write(`event: ${event}\n` + `data: ${JSON.stringify(data)}\n\n`);
  }

  broadcast(event: string, data: T) {
    for (const c of this.clients.values()) {
      this.send(c.res, event, data);
    }
  }
}
