/**
 * Unit tests for LazyLoadScheduler and the loading state machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LazyLoadScheduler, type SchedulableLoad } from './LazyLoadScheduler';
import { IllegalTransitionError, canTransition, transition, type LoadingState } from './loadingState';

class FakeLoad implements SchedulableLoad {
    state: LoadingState = 'idle';
    private settle: (() => void) | null = null;

    constructor(readonly name: string, private readonly started: string[]) {}

    enqueue(): void {
        this.state = transition(this.state, 'pending');
    }

    begin(onSettled: () => void): void {
        this.state = transition(this.state, 'active');
        this.settle = onSettled;
        this.started.push(this.name);
    }

    complete(success = true): void {
        this.state = transition(this.state, success ? 'done' : 'idle');
        const settle = this.settle;
        this.settle = null;
        settle?.();
    }
}

describe('loadingState', () => {
    it('should allow the load lifecycle and the retry edge', () => {
        expect(canTransition('idle', 'pending')).toBe(true);
        expect(canTransition('pending', 'active')).toBe(true);
        expect(canTransition('active', 'done')).toBe(true);
        expect(canTransition('active', 'idle')).toBe(true);
    });

    it('should refuse skipped and backward moves', () => {
        expect(canTransition('idle', 'active')).toBe(false);
        expect(canTransition('pending', 'done')).toBe(false);
        expect(canTransition('done', 'idle')).toBe(false);
        expect(canTransition('done', 'done')).toBe(false);
    });

    it('should throw on an illegal transition', () => {
        expect(() => transition('done', 'active')).toThrow(IllegalTransitionError);
        expect(() => transition('idle', 'done')).toThrow('Illegal loading state transition: idle -> done');
        expect(transition('active', 'idle')).toBe('idle');
    });
});

describe('LazyLoadScheduler', () => {
    let started: string[];
    let scheduler: LazyLoadScheduler<FakeLoad>;

    function load(name: string): FakeLoad {
        return new FakeLoad(name, started);
    }

    beforeEach(() => {
        started = [];
        scheduler = new LazyLoadScheduler<FakeLoad>(2);
    });

    it('should admit up to capacity and promote queued loads in order', () => {
        const [a, b, c, d] = ['A', 'B', 'C', 'D'].map(load);

        for (const item of [a, b, c, d]) {
            scheduler.register(item);
        }

        expect([a.state, b.state, c.state, d.state]).toEqual(['active', 'active', 'pending', 'pending']);
        expect(scheduler.activeCount).toBe(2);
        expect(scheduler.queuedCount).toBe(2);

        a.complete();
        expect(c.state).toBe('active');
        expect(d.state).toBe('pending');

        b.complete();
        expect(d.state).toBe('active');
        expect(started).toEqual(['A', 'B', 'C', 'D']);
        expect(scheduler.queuedCount).toBe(0);
    });

    it('should release the slot when a load fails', () => {
        const [a, b, c] = ['A', 'B', 'C'].map(load);
        scheduler.register(a);
        scheduler.register(b);
        scheduler.register(c);

        a.complete(false);

        expect(a.state).toBe('idle');
        expect(c.state).toBe('active');
        expect(scheduler.activeCount).toBe(2);
    });

    it('should let a failed load register again behind the queue', () => {
        const [a, b, c] = ['A', 'B', 'C'].map(load);
        scheduler.register(a);
        scheduler.register(b);
        scheduler.register(c);
        a.complete(false);

        expect(scheduler.register(a)).toBe(true);

        expect(a.state).toBe('pending');
        expect(c.state).toBe('active');
        b.complete();
        expect(a.state).toBe('active');
        expect(started).toEqual(['A', 'B', 'C', 'A']);
    });

    it('should ignore loads that are not idle', () => {
        const a = load('A');
        scheduler.register(a);

        expect(scheduler.register(a)).toBe(false);
        a.complete();
        expect(scheduler.register(a)).toBe(false);
        expect(started).toEqual(['A']);
    });

    it('should reject a capacity below one', () => {
        expect(() => new LazyLoadScheduler(0)).toThrow('LazyLoadScheduler: capacity must be a positive integer, got 0');
    });
});
