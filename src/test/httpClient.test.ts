import * as assert from 'assert';
import * as http from 'http';
import * as path from 'path';
import * as zlib from 'zlib';
import { HttpClient, HttpClientOptions, SendRequestError, buildOutgoingHeaders, encodeBody, encodeMultipart } from '../http';
import { initializeLogger, disposeLogger } from '../logger';
import { parseRequests } from '../parser';
import { getDefaultSettings } from '../settings';
import { BASE_DIR, MemoryFileSystem } from './helpers';

interface Received {
    method: string;
    url: string;
    headers: http.IncomingHttpHeaders;
    rawHeaders: string[];
    body: string;
}

function listen(server: http.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address && typeof address === 'object') {
                resolve(address.port);
            } else {
                reject(new Error('Server has no port'));
            }
        });
    });
}

function close(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
    });
}

suite('HTTP Client Test Suite', () => {
    const received: Received[] = [];
    let server: http.Server;
    let baseUrl: string;

    suiteSetup(async () => {
        initializeLogger({ level: 'off' });
        server = http.createServer((req, res) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => chunks.push(chunk));
            req.on('end', () => {
                received.push({
                    method: req.method ?? '',
                    url: req.url ?? '',
                    headers: req.headers,
                    rawHeaders: req.rawHeaders,
                    body: Buffer.concat(chunks).toString('utf8'),
                });
                switch (req.url) {
                    case '/redirect':
                        res.writeHead(302, { Location: '/echo' }).end();
                        break;
                    case '/see-other':
                        res.writeHead(303, { Location: '/echo' }).end();
                        break;
                    case '/loop':
                        res.writeHead(302, { Location: '/loop' }).end();
                        break;
                    case '/gzip': {
                        const compressed = zlib.gzipSync('compressed hello');
                        res.writeHead(200, { 'Content-Type': 'text/plain', 'Content-Encoding': 'gzip' }).end(compressed);
                        break;
                    }
                    default:
                        res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': '11' }).end('{"ok":true}');
                }
            });
        });
        baseUrl = `http://127.0.0.1:${await listen(server)}`;
    });

    suiteTeardown(async () => {
        await close(server);
        disposeLogger();
    });

    setup(() => {
        received.length = 0;
    });

    function build(content: string, options: HttpClientOptions = {}, fs = new MemoryFileSystem()) {
        const client = new HttpClient(options, getDefaultSettings());
        return parseRequests(content, client, BASE_DIR, { fs });
    }

    test('should send method, repeated headers and a raw body', async () => {
        const [request] = build([
            `POST ${baseUrl}/echo`,
            'X-Trace: one',
            'X-Trace: two',
            'Content-Type: text/plain',
            '',
            'hello server',
        ].join('\n'));

        const response = await request.client.execute(request);

        assert.strictEqual(response.status, 200);
        assert.strictEqual(response.statusText, 'OK');
        assert.strictEqual(response.body.toString('utf8'), '{"ok":true}');
        assert.strictEqual(response.contentLength, 11);
        assert.strictEqual(received.length, 1);
        assert.strictEqual(received[0].method, 'POST');
        assert.strictEqual(received[0].body, 'hello server');
        assert.strictEqual(received[0].headers['content-length'], '12');
        assert.strictEqual(received[0].headers['x-trace'], 'one, two');
        assert.strictEqual(received[0].rawHeaders.filter(h => h === 'X-Trace').length, 2);
    });

    test('should percent-encode url-encoded fields', async () => {
        const [request] = build([
            `POST ${baseUrl}/echo`,
            'Content-Type: application/x-www-form-urlencoded',
            '',
            'q=a b&x=1',
        ].join('\n'));

        await request.client.execute(request);

        assert.strictEqual(received[0].body, 'q=a+b&x=1');
        assert.strictEqual(received[0].headers['content-type'], 'application/x-www-form-urlencoded');
    });

    test('should send multipart bodies with their boundary', async () => {
        const notes = path.join(BASE_DIR, 'notes.txt');
        const [request] = build([
            `POST ${baseUrl}/echo`,
            'Content-Type: multipart/form-data',
            '',
            '--XYZ',
            'Content-Disposition: form-data; name="notes"',
            '',
            '< notes.txt',
            '--XYZ--',
        ].join('\n'), {}, new MemoryFileSystem({ [notes]: 'sunny' }));

        await request.client.execute(request);

        assert.strictEqual(received[0].headers['content-type'], 'multipart/form-data; boundary=XYZ');
        assert.strictEqual(
            received[0].body,
            '--XYZ\r\nContent-Disposition: form-data; name="notes"; filename="notes.txt"\r\n' +
            'Content-Type: text/plain\r\n\r\nsunny\r\n--XYZ--\r\n'
        );
    });

    test('should follow redirects', async () => {
        const [request] = build(`GET ${baseUrl}/redirect`);
        const response = await request.client.execute(request);

        assert.strictEqual(response.status, 200);
        assert.deepStrictEqual(received.map(r => r.url), ['/redirect', '/echo']);
    });

    test('should switch to GET without a body on 303', async () => {
        const [request] = build(`POST ${baseUrl}/see-other\nContent-Type: text/plain\n\npayload`);
        await request.client.execute(request);

        assert.deepStrictEqual(received.map(r => `${r.method} ${r.url} ${r.body}`), [
            'POST /see-other payload',
            'GET /echo ',
        ]);
    });

    test('should stop after the maximum number of redirects', async () => {
        const [request] = build(`GET ${baseUrl}/loop`, { maxRedirects: 2 });
        await assert.rejects(
            request.client.execute(request),
            (error: unknown) => error instanceof SendRequestError &&
                error.message === 'Error sending request: Maximum redirects (2) exceeded'
        );
        assert.strictEqual(received.length, 3);
    });

    test('should return the redirect itself when redirects are off', async () => {
        const [request] = build(`GET ${baseUrl}/redirect`, { followRedirects: false });
        const response = await request.client.execute(request);

        assert.strictEqual(response.status, 302);
        assert.strictEqual(response.headers['location'], '/echo');
    });

    test('should decompress gzip bodies', async () => {
        const [request] = build(`GET ${baseUrl}/gzip`);
        const response = await request.client.execute(request);

        assert.strictEqual(response.body.toString('utf8'), 'compressed hello');
        assert.strictEqual(response.size, zlib.gzipSync('compressed hello').length);
        assert.strictEqual(received[0].headers['accept-encoding'], 'gzip, deflate');
    });

    test('should wrap connection failures in SendRequestError', async () => {
        const closed = http.createServer();
        const port = await listen(closed);
        await close(closed);

        const [request] = build(`GET http://127.0.0.1:${port}/`);
        await assert.rejects(
            request.client.execute(request),
            (error: unknown) => error instanceof SendRequestError &&
                error.message.startsWith('Error sending request: ')
        );
    });

    test('should take options over settings', () => {
        const settings = { ...getDefaultSettings(), timeout: 1000 };
        const client = new HttpClient({ maxRedirects: 3 }, settings);
        assert.deepStrictEqual(client.getOptions(), {
            timeout: 1000,
            followRedirects: true,
            maxRedirects: 3,
            rejectUnauthorized: false,
        });
    });
});

suite('Body Encoder Test Suite', () => {
    test('should encode nothing for an empty body', () => {
        assert.deepStrictEqual(encodeBody({ kind: 'none' }), {});
    });

    test('should pass raw bytes through', () => {
        const data = Buffer.from('raw');
        assert.strictEqual(encodeBody({ kind: 'raw', data }).payload, data);
    });

    test('should escape quotes and line breaks in multipart names', () => {
        const encoded = encodeMultipart([{ kind: 'field', name: 'a"b\nc', value: 'v' }], 'B');
        assert.strictEqual(
            encoded.toString('utf8'),
            '--B\r\nContent-Disposition: form-data; name="a%22b%0Ac"\r\n\r\nv\r\n--B--\r\n'
        );
    });

    test('should group repeated headers and replace the multipart content type', () => {
        const headers = buildOutgoingHeaders(
            [
                { name: 'X-Trace', value: 'one' },
                { name: 'x-trace', value: 'two' },
                { name: 'Content-Type', value: 'multipart/form-data' },
            ],
            { payload: Buffer.from('abc'), contentType: 'multipart/form-data; boundary=B' }
        );
        assert.deepStrictEqual(headers, {
            'X-Trace': ['one', 'two'],
            'Content-Type': 'multipart/form-data; boundary=B',
            'Accept-Encoding': 'gzip, deflate',
            'Content-Length': '3',
        });
    });

    test('should keep a declared Accept-Encoding', () => {
        const headers = buildOutgoingHeaders([{ name: 'Accept-Encoding', value: 'identity' }], {});
        assert.deepStrictEqual(headers, { 'Accept-Encoding': 'identity' });
    });
});
