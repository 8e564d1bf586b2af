/**
 * Rule Table
 *
 * Ordered sender-id → rule mapping. Writes come from the control context only.
 * Every write builds a new frozen snapshot and swaps it in, so `find()` from
 * the connection worker always sees one consistent version and never a list
 * that is being edited.
 */

import path from 'path';
import Logger from '../core/logger';
import {
    DuplicateRuleKeyError,
    InvalidRuleError,
    InvalidSoundExtensionError,
    RuleNotFoundError,
    type RuleValidationError
} from '../core/errors';
import type { Rule, RuleInput } from '../types';

export const ALLOWED_AUDIO_EXTENSIONS = ['.wav', '.mp3'] as const;

export const DEFAULT_VOLUME = 100;

export type RuleResult =
    | { ok: true; rule: Rule }
    | { ok: false; error: RuleValidationError };

export interface RuleLookup {
    find(senderId: string): Rule | undefined;
}

interface Snapshot {
    readonly order: readonly Rule[];
    readonly byId: ReadonlyMap<string, Rule>;
}

export function clampVolume(volume: unknown): number {
    const value = typeof volume === 'number' ? volume : Number(volume);
    if (!Number.isFinite(value)) return DEFAULT_VOLUME;
    return Math.max(0, Math.min(100, Math.round(value)));
}

export function hasAllowedExtension(soundPath: string): boolean {
    const ext = path.extname(soundPath).toLowerCase();
    return ALLOWED_AUDIO_EXTENSIONS.some((allowed) => allowed === ext);
}

/**
 * Normalise caller input into a frozen Rule, or explain why it is rejected.
 */
export function buildRule(input: RuleInput): RuleResult {
    const senderId = input.senderId.trim();
    const soundPath = input.soundPath.trim();
    if (!senderId) {
        return { ok: false, error: new InvalidRuleError('Sender id is required') };
    }
    if (!hasAllowedExtension(soundPath)) {
        return { ok: false, error: new InvalidSoundExtensionError(soundPath, ALLOWED_AUDIO_EXTENSIONS) };
    }
    const rule: Rule = Object.freeze({
        name: (input.name ?? '').trim(),
        senderId,
        soundPath,
        volume: input.volume === undefined ? DEFAULT_VOLUME : clampVolume(input.volume),
        pushSound: (input.pushSound ?? '').trim()
    });
    return { ok: true, rule };
}

function makeSnapshot(rules: readonly Rule[]): Snapshot {
    const order = Object.freeze([...rules]);
    return { order, byId: new Map(order.map((rule) => [rule.senderId, rule])) };
}

class RuleTable implements RuleLookup {
    logger: Logger;
    private snapshot: Snapshot;

    constructor(rules: readonly Rule[] = [], logger?: Logger) {
        this.logger = logger || new Logger('Rules');
        this.snapshot = makeSnapshot([]);
        this.replaceAll(rules);
    }

    get size(): number {
        return this.snapshot.order.length;
    }

    /**
     * Swap in a whole rule list, e.g. after loading config. Entries repeating
     * an earlier sender id are dropped.
     */
    replaceAll(rules: readonly Rule[]): void {
        const seen = new Set<string>();
        const kept: Rule[] = [];
        for (const rule of rules) {
            if (seen.has(rule.senderId)) {
                this.logger.warn(`Dropping duplicate rule for sender ${rule.senderId}`);
                continue;
            }
            seen.add(rule.senderId);
            kept.push(Object.freeze({ ...rule, volume: clampVolume(rule.volume) }));
        }
        this.snapshot = makeSnapshot(kept);
    }

    add(input: RuleInput): RuleResult {
        const built = buildRule(input);
        if (!built.ok) return built;
        const current = this.snapshot;
        if (current.byId.has(built.rule.senderId)) {
            return { ok: false, error: new DuplicateRuleKeyError(built.rule.senderId) };
        }
        this.snapshot = makeSnapshot([...current.order, built.rule]);
        this.logger.debug(`Added rule for sender ${built.rule.senderId}`);
        return built;
    }

    /**
     * Replace the rule keyed by `oldId`, keeping its position. The new sender id
     * may equal `oldId` but must not belong to any other rule.
     */
    update(oldId: string, input: RuleInput): RuleResult {
        const current = this.snapshot;
        const index = current.order.findIndex((rule) => rule.senderId === oldId);
        if (index === -1) {
            return { ok: false, error: new RuleNotFoundError(oldId) };
        }
        const built = buildRule(input);
        if (!built.ok) return built;
        const newId = built.rule.senderId;
        if (newId !== oldId && current.byId.has(newId)) {
            return { ok: false, error: new DuplicateRuleKeyError(newId) };
        }
        const next = [...current.order];
        next[index] = built.rule;
        this.snapshot = makeSnapshot(next);
        this.logger.debug(`Updated rule ${oldId}${newId !== oldId ? ` -> ${newId}` : ''}`);
        return built;
    }

    /**
     * Returns whether a rule was removed; removing an unknown id is a no-op.
     */
    remove(senderId: string): boolean {
        const current = this.snapshot;
        if (!current.byId.has(senderId)) return false;
        this.snapshot = makeSnapshot(current.order.filter((rule) => rule.senderId !== senderId));
        this.logger.debug(`Removed rule for sender ${senderId}`);
        return true;
    }

    find(senderId: string): Rule | undefined {
        return this.snapshot.byId.get(senderId);
    }

    all(): readonly Rule[] {
        return this.snapshot.order;
    }

    /**
     * Apply a new order. `newOrder` must list every current sender id exactly
     * once; anything else is rejected and the table is left as it was.
     */
    reorder(newOrder: readonly string[]): boolean {
        const current = this.snapshot;
        if (newOrder.length !== current.order.length || new Set(newOrder).size !== newOrder.length) {
            return false;
        }
        const next: Rule[] = [];
        for (const id of newOrder) {
            const rule = current.byId.get(id);
            if (!rule) return false;
            next.push(rule);
        }
        this.snapshot = makeSnapshot(next);
        return true;
    }

    /**
     * Move one rule to `toIndex` (clamped to the list bounds).
     */
    move(senderId: string, toIndex: number): boolean {
        const ids = this.snapshot.order.map((rule) => rule.senderId);
        const from = ids.indexOf(senderId);
        if (from === -1) return false;
        ids.splice(from, 1);
        const target = Math.max(0, Math.min(ids.length, Math.trunc(toIndex)));
        ids.splice(target, 0, senderId);
        return this.reorder(ids);
    }

    /**
     * Sort by display name; unnamed rules sort by sender id.
     */
    sortByName(direction: 'asc' | 'desc' = 'asc'): void {
        const sign = direction === 'asc' ? 1 : -1;
        const sorted = [...this.snapshot.order].sort((a, b) => {
            const left = (a.name || a.senderId).toLowerCase();
            const right = (b.name || b.senderId).toLowerCase();
            return sign * left.localeCompare(right);
        });
        this.snapshot = makeSnapshot(sorted);
    }
}

export default RuleTable;
