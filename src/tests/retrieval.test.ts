import { describe, it } from 'node:test';
import assert from 'node:assert';

import { TransportError } from '../enrolltypes/EnrollError';
import { retrieve } from '../issuer/retrieval';
import { FakeIssuerClient, RecordingSleeper, reply, testConfig } from './fakeIssuer';

const certificate = '-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----\n';

describe('retrieve', () => {
    const config = testConfig();

    it('returns the first successful response without waiting', async () => {
        let client = new FakeIssuerClient(() => reply(200, certificate));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(config, client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'success', document: certificate, attempts: 1 });
        assert.equal(client.requests.length, 1);
        assert.equal(client.requests[0].method, 'GET');
        assert.equal(client.requests[0].url, 'https://issuer.test/api/ssl/v1/collect/4711/x509CO');
        assert.deepEqual(sleeper.waits, []);
    });

    it('succeeds on the twentieth attempt', async () => {
        let client = new FakeIssuerClient((_request, index) => index < 19 ? reply(400, '{"code":0,"description":"Being processed"}') : reply(200, certificate));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(config, client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'success', document: certificate, attempts: 20 });
        assert.equal(client.requests.length, 20);
        assert.equal(sleeper.waits.length, 19);
    });

    it('gives up after twenty attempts and waits after each one', async () => {
        let client = new FakeIssuerClient(() => reply(404));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(config, client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'exhausted', attempts: 20, lastStatus: 404 });
        assert.equal(client.requests.length, 20);
        assert.deepEqual(sleeper.waits, new Array(20).fill(5000));
    });

    it('reports when no attempt produced a response', async () => {
        let client = new FakeIssuerClient(() => new TransportError('connection', 'connection failure: ECONNREFUSED', 'ECONNREFUSED'));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(config, client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'exhausted', attempts: 20 });
        assert.equal(client.requests.length, 20);
    });

    it('keeps polling through authentication and connection failures', async () => {
        let client = new FakeIssuerClient((_request, index) => index == 0
            ? new TransportError('authentication', 'authentication failure')
            : index == 1
            ? new TransportError('connection', 'connection failure')
            : reply(200, certificate));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(config, client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'success', document: certificate, attempts: 3 });
        assert.deepEqual(sleeper.waits, [ 5000, 5000 ]);
    });

    it('honours a configured attempt limit', async () => {
        let client = new FakeIssuerClient(() => reply(404));
        let sleeper = new RecordingSleeper();
        let outcome = await retrieve(testConfig({ timing: { maxRetry: 3, retrievalWait: 10 } }), client, '4711', sleeper.wait);

        assert.deepEqual(outcome, { status: 'exhausted', attempts: 3, lastStatus: 404 });
        assert.deepEqual(sleeper.waits, [ 10, 10, 10 ]);
    });

    it('lets other errors through', async () => {
        let client = new FakeIssuerClient(() => new TypeError('broken'));
        await assert.rejects(retrieve(config, client, '4711', new RecordingSleeper().wait), TypeError);
        assert.equal(client.requests.length, 1);
    });
});
