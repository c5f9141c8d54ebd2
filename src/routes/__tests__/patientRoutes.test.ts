import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { TestServer, sendJson, startTestServer } from './testServer';

describe('patient routes', () => {
    let server: TestServer;

    beforeEach(async () => {
        server = await startTestServer();
    });

    afterEach(async () => {
        await server.close();
    });

    it('registers a patient', async () => {
        const res = await sendJson(`${server.baseUrl}/patients`, 'POST', { id: 'P1', name: 'Ann', age: 30, severity: 5 });

        expect(res.status).toBe(201);
        expect(await res.json()).toMatchObject({ patient: { id: 'P1', name: 'Ann', age: 30, severity: 5, arrivalSeq: 0 } });
    });

    it('normalizes out-of-range values instead of rejecting them', async () => {
        const res = await sendJson(`${server.baseUrl}/patients`, 'POST', { id: '', name: '', age: -5, severity: 99 });

        expect(res.status).toBe(201);
        expect(await res.json()).toMatchObject({ patient: { id: 'No Id', name: 'No Name', age: 0, severity: 1 } });
    });

    it('rejects a body of the wrong shape with 400', async () => {
        const res = await sendJson(`${server.baseUrl}/patients`, 'POST', { id: 'P1', name: 'Ann', age: 'thirty', severity: 5 });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: 'Invalid patient' });
        expect(server.stores.registry.count()).toBe(0);
    });

    it('updates a known patient and 404s an unknown one', async () => {
        server.stores.registry.register('P1', 'Ann', 30, 5);

        const updated = await sendJson(`${server.baseUrl}/patients/P1`, 'PATCH', { severity: 9 });
        const missing = await sendJson(`${server.baseUrl}/patients/P9`, 'PATCH', { severity: 9 });

        expect(updated.status).toBe(200);
        expect(await updated.json()).toMatchObject({ patient: { id: 'P1', name: 'Ann', severity: 9 } });
        expect(missing.status).toBe(404);
        expect(await missing.json()).toEqual({ error: 'Patient not found' });
    });

    it('rejects an update of the wrong shape with 400', async () => {
        server.stores.registry.register('P1', 'Ann', 30, 5);

        const res = await sendJson(`${server.baseUrl}/patients/P1`, 'PATCH', { age: 'old' });

        expect(res.status).toBe(400);
        expect(server.stores.registry.lookup('P1')?.age).toBe(30);
    });

    it('looks up a patient by id', async () => {
        server.stores.registry.register('P1', 'Ann', 30, 5);

        const found = await fetch(`${server.baseUrl}/patients/P1`);
        const missing = await fetch(`${server.baseUrl}/patients/nobody`);

        expect(await found.json()).toMatchObject({ patient: { id: 'P1', name: 'Ann' } });
        expect(missing.status).toBe(404);
    });

    it('imports patients from a CSV body', async () => {
        const res = await fetch(`${server.baseUrl}/patients/import`, {
            method: 'POST',
            headers: { 'content-type': 'text/csv' },
            body: 'id,name,age,severity\nP1,"Ann, B",30,5\n'
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ imported: 1, patients: 1 });
        expect(server.stores.registry.lookup('P1')?.name).toBe('Ann, B');
    });

    it('reports the offending line of a bad import with 400', async () => {
        const res = await fetch(`${server.baseUrl}/patients/import`, {
            method: 'POST',
            headers: { 'content-type': 'text/csv' },
            body: 'id,name,age,severity\nP1,Ann,30,5\nP2,Bo,x,4\n'
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: 'Invalid number in row (line 3): P2,Bo,x,4',
            line: 3,
            content: 'P2,Bo,x,4',
            patients: 1
        });
    });
});
