/**
 * Collaborator Registry: one descriptor per capability.
 *
 * The Router dispatches purely on capability tag, so a second collaborator
 * claiming an already-registered capability is a configuration error, raised
 * before any session starts. Key ownership for the Shared Context Store is
 * derived from the registered descriptors' output keys.
 */

import {
  SESSION_OWNER,
  type Capability,
  type CollaboratorDescriptor,
  type ContextKey,
  type WorkflowStage,
} from './agent-protocol.js';
import { CapabilityNotFound, DuplicateCapability, InvalidDescriptor } from './errors.js';

export class CollaboratorRegistry {
  private readonly byCapability = new Map<Capability, CollaboratorDescriptor>();
  private readonly owners = new Map<ContextKey, string[]>();
  private readonly sessionOnly = new Set<ContextKey>();

  /**
   * @param sessionKeys keys only the session writes, seeded at intake
   * @param seedKeys collaborator keys the session may also write, to seed a starting value
   */
  constructor(sessionKeys: readonly ContextKey[] = [], seedKeys: readonly ContextKey[] = []) {
    for (const key of sessionKeys) {
      this.owners.set(key, [SESSION_OWNER]);
      this.sessionOnly.add(key);
    }
    for (const key of seedKeys) {
      if (!this.sessionOnly.has(key)) this.owners.set(key, [SESSION_OWNER]);
    }
  }

  register(descriptor: CollaboratorDescriptor): void {
    const existing = this.byCapability.get(descriptor.capability);
    if (existing) {
      throw new DuplicateCapability(descriptor.capability, existing.identity.name, descriptor.identity.name);
    }

    const name = descriptor.identity.name;
    if (name === SESSION_OWNER) {
      throw new InvalidDescriptor(name, `"${SESSION_OWNER}" is reserved for intake keys`);
    }
    if (descriptor.output_keys.length === 0) {
      throw new InvalidDescriptor(name, 'no output keys declared');
    }
    const shape = descriptor.output_schema.shape;
    for (const key of descriptor.output_keys) {
      if (!(key in shape)) {
        throw new InvalidDescriptor(name, `output key "${key}" is not a property of its output schema`);
      }
      if (this.sessionOnly.has(key)) {
        throw new InvalidDescriptor(name, `output key "${key}" is owned by the session`);
      }
    }

    this.byCapability.set(descriptor.capability, descriptor);
    for (const key of descriptor.output_keys) {
      const keyOwners = this.owners.get(key) ?? [];
      if (!keyOwners.includes(name)) keyOwners.push(name);
      this.owners.set(key, keyOwners);
    }
  }

  resolve(capability: Capability): CollaboratorDescriptor {
    const descriptor = this.byCapability.get(capability);
    if (!descriptor) throw new CapabilityNotFound(capability);
    return descriptor;
  }

  has(capability: Capability): boolean {
    return this.byCapability.has(capability);
  }

  /** Declared owners of a key; empty when nobody may write it. */
  ownersOf(key: ContextKey): readonly string[] {
    return this.owners.get(key) ?? [];
  }

  /** Collaborators serving a stage, in registration order. */
  forStage(stage: WorkflowStage): CollaboratorDescriptor[] {
    return [...this.byCapability.values()].filter((d) => d.stage === stage);
  }

  list(): CollaboratorDescriptor[] {
    return [...this.byCapability.values()];
  }

  get size(): number {
    return this.byCapability.size;
  }

  /** Summary for logs and the health endpoint. */
  describe(): Array<{ name: string; capability: Capability; stage: WorkflowStage; outputs: readonly ContextKey[] }> {
    return this.list().map((d) => ({
      name: d.identity.name,
      capability: d.capability,
      stage: d.stage,
      outputs: d.output_keys,
    }));
  }
}
