import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { readFile, readdir, stat, writeFile } from 'fs/promises';
import { pki } from 'node-forge';

import { BatchOrchestrator, formatSummary } from '../batch/batchOrchestrator';
import { CsrBuilder } from '../crypto/csrBuilder';
import { ArgumentError, CryptoError, TransportError } from '../enrolltypes/EnrollError';
import { HostState } from '../enrolltypes/Outcomes';
import { hostSpec } from '../utility/hostFile';
import { FakeIssuerClient, IssuerScript, RecordedRequest, RecordingSleeper, makeTempDir, payloadField, removeTempDir, reply, testConfig } from './fakeIssuer';

function certificateFor(id: string): string {
    return `-----BEGIN CERTIFICATE-----\nissued ${id}\n-----END CERTIFICATE-----\n`;
}

function idFromUrl(request: RecordedRequest): string {
    let match = /collect\/(\d+)\/x509CO$/.exec(request.url);
    return match ? match[1] : 'none';
}

/**
 * Issuer that accepts every enrollment except those whose comment mentions one of rejectHosts,
 * numbering them from 100, and hands back certificates except for ids in pendingIds.
 */
function issuer(rejectHosts: string[] = [], pendingIds: string[] = []): IssuerScript {
    let nextId = 100;

    return (request) => {
        if (request.method == 'POST') {
            let comments = payloadField(request, 'comments') ?? '';
            return rejectHosts.some((host) => comments.endsWith(`CN=${host}`))
                ? reply(500, '{"code":-1,"description":"rejected"}')
                : reply(200, JSON.stringify({ sslId: nextId++ }));
        }

        let id = idFromUrl(request);
        return pendingIds.includes(id) ? reply(404, '{"code":0,"description":"pending"}') : reply(200, certificateFor(id));
    };
}

describe('BatchOrchestrator', () => {
    const builder = new CsrBuilder({ keySize: 2048 });
    let dir: string;
    let sleeper: RecordingSleeper;

    beforeEach(async () => {
        dir = await makeTempDir();
        sleeper = new RecordingSleeper();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    function orchestrator(client: FakeIssuerClient): BatchOrchestrator {
        return new BatchOrchestrator({ config: testConfig({ output: { directory: dir } }), client: client, builder: builder, wait: sleeper.wait });
    }

    it('retrieves the hosts that were accepted and skips the one that was not', async () => {
        let client = new FakeIssuerClient(issuer([ 'b.example.org' ]));
        let result = await orchestrator(client).run([
            hostSpec('a.example.org', [ 'www.a.example.org' ]),
            hostSpec('b.example.org'),
            hostSpec('c.example.org'),
        ]);

        assert.equal(result.requested, 3);
        assert.equal(result.submitted, 2);
        assert.equal(result.retrieved, 2);
        assert.equal(formatSummary(result), '3 specified / 2 retrieved');
        assert.deepEqual(result.hosts.map((h) => h.state), [ HostState.Retrieved, HostState.Rejected, HostState.Retrieved ]);

        assert.deepEqual((await readdir(dir)).sort(), [
            'a.example.org.pem',
            'a.example.org_key.pem',
            'c.example.org.pem',
            'c.example.org_key.pem',
        ]);
        assert.equal(await readFile(path.join(dir, 'a.example.org.pem'), { encoding: 'utf8' }), certificateFor('100'));
        assert.equal(await readFile(path.join(dir, 'c.example.org.pem'), { encoding: 'utf8' }), certificateFor('101'));

        // The rejected host is neither retried nor polled
        assert.equal(client.requests.filter((r) => r.method == 'POST').length, 3);
        assert.deepEqual(client.requests.filter((r) => r.method == 'GET').map(idFromUrl), [ '100', '101' ]);
    });

    it('waits for approval once for the whole batch', async () => {
        let client = new FakeIssuerClient(issuer());
        await orchestrator(client).run([ hostSpec('a.example.org'), hostSpec('b.example.org'), hostSpec('c.example.org') ]);

        assert.deepEqual(sleeper.waits, [ 30000 ]);
    });

    it('requests duplicate hosts once', async () => {
        let client = new FakeIssuerClient(issuer());
        let result = await orchestrator(client).run([
            hostSpec('a.example.org', [ 'x.example.org' ]),
            hostSpec('b.example.org'),
            hostSpec('a.example.org', [ 'x.example.org' ]),
        ]);

        assert.equal(result.requested, 2);
        assert.equal(client.requests.filter((r) => r.method == 'POST').length, 2);
    });

    it('writes the key as soon as the request is accepted and keeps it when retrieval fails', async () => {
        let client = new FakeIssuerClient(issuer([], [ '100' ]));
        let result = await orchestrator(client).run([ hostSpec('a.example.org') ]);

        assert.equal(result.retrieved, 0);
        assert.equal(formatSummary(result), '1 specified / 0 retrieved');
        assert.equal(result.hosts[0].state, HostState.NotRetrieved);
        assert.deepEqual(await readdir(dir), [ 'a.example.org_key.pem' ]);

        let keyPath = path.join(dir, 'a.example.org_key.pem');
        assert.equal((await stat(keyPath)).mode & 0o777, 0o600);
        pki.privateKeyFromPem(await readFile(keyPath, { encoding: 'utf8' }));

        assert.equal(client.requests.filter((r) => r.method == 'GET').length, 20);
        assert.equal(sleeper.waits.length, 21);
    });

    it('moves an existing certificate aside before writing the new one', async () => {
        let target = path.join(dir, 'a.example.org.pem');
        await writeFile(target, 'old certificate');

        let client = new FakeIssuerClient(issuer());
        let result = await orchestrator(client).run([ hostSpec('a.example.org') ]);

        assert.equal(await readFile(target, { encoding: 'utf8' }), certificateFor('100'));
        assert.equal(await readFile(target + '.bak', { encoding: 'utf8' }), 'old certificate');
        assert.equal(result.hosts[0].relocatedTo, target + '.bak');
    });

    it('moves an existing key aside before writing the new one', async () => {
        let keyPath = path.join(dir, 'a.example.org_key.pem');
        await writeFile(keyPath, 'old key');

        let client = new FakeIssuerClient(issuer());
        let result = await orchestrator(client).run([ hostSpec('a.example.org') ]);

        assert.equal(await readFile(keyPath + '.bak', { encoding: 'utf8' }), 'old key');
        assert.equal(result.hosts[0].keyPath, keyPath);
        assert.equal(result.hosts[0].keyRelocatedTo, keyPath + '.bak');

        let key = pki.privateKeyFromPem(await readFile(keyPath, { encoding: 'utf8' }));
        let csr = pki.certificationRequestFromPem(String(payloadField(client.requests[0], 'csr')));
        assert.equal(pki.publicKeyToPem(pki.rsa.setPublicKey(key.n, key.e)), csr.publicKey == null ? null : pki.publicKeyToPem(csr.publicKey),
            'New key does not match the submitted request');
    });

    it('refuses hosts that would share output files before generating any key', async () => {
        let client = new FakeIssuerClient(issuer());

        await assert.rejects(orchestrator(client).run([
            hostSpec('a.example.org'),
            hostSpec('a.example.org', [ 'x.example.org' ]),
        ]), ArgumentError);
        await assert.rejects(orchestrator(client).run([
            hostSpec('*.example.org'),
            hostSpec('_.example.org'),
        ]), ArgumentError);

        assert.equal(client.requests.length, 0);
        assert.deepEqual(await readdir(dir), []);
    });

    it('does not write an empty certificate', async () => {
        let client = new FakeIssuerClient((request) => request.method == 'POST' ? reply(200, '{"sslId":100}') : reply(200, ''));
        let result = await orchestrator(client).run([ hostSpec('a.example.org') ]);

        assert.equal(result.retrieved, 0);
        assert.equal(result.hosts[0].state, HostState.NotRetrieved);
        assert.equal(result.hosts[0].certificatePath, undefined);
        assert.deepEqual(await readdir(dir), [ 'a.example.org_key.pem' ]);
    });

    it('names files after the sanitized common name', async () => {
        let client = new FakeIssuerClient(issuer());
        let result = await orchestrator(client).run([ hostSpec('*.example.org') ]);

        assert.equal(result.hosts[0].certificatePath, path.join(dir, '_.example.org.pem'));
        assert.equal(result.hosts[0].keyPath, path.join(dir, '_.example.org_key.pem'));
    });

    it('submits nothing when a request cannot be built', async () => {
        let client = new FakeIssuerClient(issuer());
        await assert.rejects(orchestrator(client).run([ hostSpec('good.example.org'), hostSpec('bad host') ]), CryptoError);

        assert.equal(client.requests.length, 0);
        assert.deepEqual(await readdir(dir), []);
    });

    it('stops when the issuer cannot be reached during submission', async () => {
        let client = new FakeIssuerClient(() => new TransportError('authentication', 'authentication failure: bad certificate'));
        await assert.rejects(orchestrator(client).run([ hostSpec('a.example.org'), hostSpec('b.example.org') ]), TransportError);

        assert.equal(client.requests.length, 1);
    });

    it('does not wait when nothing was accepted', async () => {
        let client = new FakeIssuerClient(issuer([ 'a.example.org' ]));
        let result = await orchestrator(client).run([ hostSpec('a.example.org') ]);

        assert.equal(formatSummary(result), '1 specified / 0 retrieved');
        assert.deepEqual(sleeper.waits, []);
        assert.deepEqual(await readdir(dir), []);
    });
});
