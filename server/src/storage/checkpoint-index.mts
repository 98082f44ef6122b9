// 检查点父指针索引
// 一次查询取出线程内所有 (checkpoint_id, parent_checkpoint_id)，在内存里沿父指针回溯
// 损坏数据中的环会被 visited 集合截断

export interface CheckpointLink {
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
}

export class CheckpointIndex {
  private readonly parents = new Map<string, string | null>();

  constructor(links: Iterable<CheckpointLink>) {
    for (const link of links) {
      this.parents.set(link.checkpoint_id, link.parent_checkpoint_id);
    }
  }

  // 从给定检查点回溯到根：[自身, 父, 祖父, ...]
  ancestry(checkpointId: string, maxDepth = Number.POSITIVE_INFINITY): string[] {
    const chain: string[] = [];
    const visited = new Set<string>();
    let current: string | null | undefined = checkpointId;
    while (current && this.parents.has(current) && !visited.has(current) && chain.length < maxDepth) {
      visited.add(current);
      chain.push(current);
      current = this.parents.get(current);
    }
    return chain;
  }
}
