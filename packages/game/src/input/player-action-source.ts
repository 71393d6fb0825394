/**
 * Player Action Source
 *
 * Queue of actions fed by whatever reads player input. The scheduler drains
 * one per player per turn; an empty queue means the player waits.
 */

import type { Entity } from "@delve/ecs";
import { type Action, WAIT } from "../turn/actions";
import type { WorldSnapshot } from "../turn/snapshot";
import type { ActionSource } from "../turn/turn-scheduler";

export class PlayerActionSource implements ActionSource {
  private readonly queues = new Map<Entity, Action[]>();

  enqueue(entity: Entity, ...actions: Action[]): void {
    const queue = this.queues.get(entity);
    if (queue) {
      queue.push(...actions);
    } else {
      this.queues.set(entity, [...actions]);
    }
  }

  pending(entity: Entity): number {
    return this.queues.get(entity)?.length ?? 0;
  }

  clear(entity?: Entity): void {
    if (entity === undefined) {
      this.queues.clear();
    } else {
      this.queues.delete(entity);
    }
  }

  /**
   * Keeps only the queues of entities matching `keep`.
   */
  retain(keep: (entity: Entity) => boolean): void {
    for (const entity of [...this.queues.keys()]) {
      if (!keep(entity)) this.queues.delete(entity);
    }
  }

  decide(entity: Entity, _snapshot: WorldSnapshot): Action {
    return this.queues.get(entity)?.shift() ?? WAIT;
  }
}
