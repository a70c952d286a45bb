// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% ActivePipeRegistry Class %%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

/*
Bookkeeping of currently running pipes, kept per relay.  Only used for
the "n pipes active" log lines; nothing about forwarding depends on it.
*/

type active_pipe_info_t = {
  uuid: string;
  description: string;
  registered_at: number;
};

class ActivePipeRegistry {
  pipe_map: Map<string, active_pipe_info_t> = new Map<
    string,
    active_pipe_info_t
  >();

  register(uuid: string, description: string): number {
    this.pipe_map.set(uuid, {
      uuid: uuid,
      description: description,
      registered_at: Date.now()
    });
    return this.pipe_map.size;
  }

  // returns the remaining count
  unregister(uuid: string): number {
    this.pipe_map.delete(uuid);
    return this.pipe_map.size;
  }

  has(uuid: string): boolean {
    return this.pipe_map.has(uuid);
  }

  count(): number {
    return this.pipe_map.size;
  }

  list(): active_pipe_info_t[] {
    return Array.from(this.pipe_map.values());
  }
}

export { ActivePipeRegistry };
export type { active_pipe_info_t };
