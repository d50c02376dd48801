import { describe, it, expect, vi } from 'vitest';
import { AdmissionGate } from '../../../packages/shared/src/concurrency/admission-gate.js';
import type { AdmissionTicket } from '../../../packages/shared/src/concurrency/admission-gate.js';
import {
    AdmissionTimeoutError,
    ConfigurationError,
    RequestCancelledError,
} from '../../../packages/shared/src/types/errors.js';
import { flushPromises } from '../../utils/test-helpers.js';

describe('AdmissionGate', () => {
    it('admits immediately while below the limit', async () => {
        const gate = new AdmissionGate(2);

        const first = await gate.admit();
        const second = await gate.admit();

        expect(first.id).not.toBe(second.id);
        expect(gate.getStats()).toEqual({ limit: 2, inFlight: 2, queued: 0, issued: 2, released: 0 });
    });

    it('hands freed slots to waiters in arrival order', async () => {
        const gate = new AdmissionGate(1);
        const held = await gate.admit();
        const order: string[] = [];

        const second = gate.admit().then(ticket => {
            order.push('second');
            return ticket;
        });
        const third = gate.admit().then(ticket => {
            order.push('third');
            return ticket;
        });
        expect(gate.getStats().queued).toBe(2);

        held.release();
        const secondTicket = await second;
        await flushPromises();
        expect(order).toEqual(['second']);
        expect(gate.getStats()).toMatchObject({ inFlight: 1, queued: 1 });

        secondTicket.release();
        await third;
        expect(order).toEqual(['second', 'third']);
    });

    it('does not let a newcomer overtake queued waiters', async () => {
        const gate = new AdmissionGate(1);
        const held = await gate.admit();
        const queued = gate.admit();

        held.release();
        const newcomer = gate.admit();

        const queuedTicket = await queued;
        expect(gate.getStats()).toMatchObject({ inFlight: 1, queued: 1 });

        queuedTicket.release();
        await expect(newcomer).resolves.toHaveProperty('released', false);
    });

    it('fails a waiter with AdmissionTimeout once its timeout elapses', async () => {
        vi.useFakeTimers();
        const gate = new AdmissionGate(1);
        await gate.admit();

        const waiting = gate.admit(50);
        const assertion = expect(waiting).rejects.toBeInstanceOf(AdmissionTimeoutError);

        await vi.advanceTimersByTimeAsync(49);
        expect(gate.getStats().queued).toBe(1);

        await vi.advanceTimersByTimeAsync(1);
        await assertion;
        await expect(waiting).rejects.toThrow('Admission gate saturated for 50ms');
        expect(gate.getStats()).toMatchObject({ inFlight: 1, queued: 0 });
    });

    it('waits indefinitely when no timeout is given', async () => {
        vi.useFakeTimers();
        const gate = new AdmissionGate(1);
        const held = await gate.admit();

        let admitted = false;
        const waiting = gate.admit().then(ticket => {
            admitted = true;
            return ticket;
        });

        await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
        expect(admitted).toBe(false);

        held.release();
        await waiting;
        expect(admitted).toBe(true);
    });

    it('removes a cancelled waiter without consuming a ticket', async () => {
        const gate = new AdmissionGate(1);
        const held = await gate.admit();
        const controller = new AbortController();

        const waiting = gate.admit(undefined, controller.signal);
        controller.abort();

        await expect(waiting).rejects.toBeInstanceOf(RequestCancelledError);
        expect(gate.getStats()).toMatchObject({ inFlight: 1, queued: 0, issued: 1 });

        held.release();
        expect(gate.getStats()).toMatchObject({ inFlight: 0, released: 1 });
    });

    it('rejects an already aborted request even with free capacity', async () => {
        const gate = new AdmissionGate(1);
        const controller = new AbortController();
        controller.abort();

        await expect(gate.admit(1000, controller.signal)).rejects.toThrow('Request cancelled during admission');
        expect(gate.getStats()).toMatchObject({ inFlight: 0, issued: 0 });
    });

    it('frees capacity only on the first release of a ticket', async () => {
        const gate = new AdmissionGate(2);
        const ticket = await gate.admit();
        await gate.admit();

        ticket.release();
        ticket.release();

        expect(ticket.released).toBe(true);
        expect(gate.getStats()).toMatchObject({ inFlight: 1, released: 1 });
    });

    it('never has more tickets outstanding than the limit', async () => {
        const gate = new AdmissionGate(3);
        let held = 0;
        let peak = 0;

        const work = Array.from({ length: 20 }, async (_, index) => {
            const ticket: AdmissionTicket = await gate.admit();
            held++;
            peak = Math.max(peak, held);
            await new Promise(resolve => setTimeout(resolve, index % 4));
            held--;
            ticket.release();
        });
        await Promise.all(work);

        expect(peak).toBe(3);
        expect(gate.getStats()).toEqual({ limit: 3, inFlight: 0, queued: 0, issued: 20, released: 20 });
    });

    it('rejects a non-positive limit', () => {
        expect(() => new AdmissionGate(0)).toThrow(ConfigurationError);
    });
});
