/**
 * ActorGroup — a shared, mutable collection of actor references.
 *
 * A group is never copied: a scene registers the group object itself, so
 * actors added through the scene and actors added through any other holder
 * of the same group land in the same collection.
 */

import { Actor } from "./actor.js";

export class ActorGroup implements Iterable<Actor> {
  private readonly members: Actor[] = [];

  constructor(actors: readonly Actor[] = []) {
    this.members.push(...actors);
  }

  /** Append actors. Accepts single actors and arrays of actors. */
  add(...actors: ReadonlyArray<Actor | readonly Actor[]>): void {
    for (const entry of actors) {
      if (entry instanceof Actor) {
        this.members.push(entry);
      } else {
        this.members.push(...entry);
      }
    }
  }

  has(actor: Actor): boolean {
    return this.members.includes(actor);
  }

  get length(): number {
    return this.members.length;
  }

  toArray(): Actor[] {
    return [...this.members];
  }

  [Symbol.iterator](): Iterator<Actor> {
    return this.members[Symbol.iterator]();
  }
}
