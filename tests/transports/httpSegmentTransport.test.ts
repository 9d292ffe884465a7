import express from 'express';
import { Server } from 'http';
import { HttpSegmentTransport, buildSegmentUrl } from '../../src/transports/httpSegmentTransport';
import { ManualClock } from '../../src/core/clock';
import { ProgressEvent, SegmentRequest } from '../../src/types';

const request = (segmentIndex: number, id = 'mid'): SegmentRequest => ({
    sessionId: 'http-test',
    segmentIndex,
    representation: { id, nominalBitrateBps: 2_000_000 },
    requestedAt: 0,
});

describe('buildSegmentUrl', () => {
    it('should fill the template and join without doubled slashes', () => {
        expect(buildSegmentUrl('http://origin.test/vod/', '/{representationId}/segment_{segmentIndex}.m4s', request(3))).toBe(
            'http://origin.test/vod/mid/segment_3.m4s'
        );
    });

    it('should encode representation ids', () => {
        expect(buildSegmentUrl('http://origin.test', '{representationId}/{segmentIndex}', request(0, 'a b'))).toBe(
            'http://origin.test/a%20b/0'
        );
    });
});

describe('HttpSegmentTransport', () => {
    let server: Server;
    let baseUrl: string;
    let clock: ManualClock;
    const requestedPaths: string[] = [];

    beforeAll(done => {
        const app = express();
        app.get('/vod/:rep/:file', (req, res) => {
            requestedPaths.push(req.path);
            if (req.params.rep === 'missing') {
                res.status(404).send('Not Found');
                return;
            }
            if (req.params.rep === 'slow') {
                return;
            }
            clock.advance(1500);
            res.send(Buffer.alloc(300000));
        });
        server = app.listen(0, '127.0.0.1', () => {
            const address = server.address();
            const port = address && typeof address === 'object' ? address.port : 0;
            baseUrl = `http://127.0.0.1:${port}/vod`;
            done();
        });
    });

    afterAll(done => {
        server.closeAllConnections();
        server.close(() => done());
    });

    beforeEach(() => {
        clock = new ManualClock(0);
        requestedPaths.length = 0;
    });

    const transport = () =>
        new HttpSegmentTransport({ baseUrl, segmentTemplate: '{representationId}/segment_{segmentIndex}.m4s', clock });

    it('should report the whole body as one final observation', async () => {
        const events: ProgressEvent[] = [];

        await transport().fetchSegment(request(3), event => events.push(event), new AbortController().signal);

        expect(requestedPaths).toEqual(['/vod/mid/segment_3.m4s']);
        expect(events).toEqual([
            {
                segmentIndex: 3,
                representationId: 'mid',
                bytesSoFar: 300000,
                elapsedSoFar: 1.5,
                isFirstChunk: true,
                isFinal: true,
            },
        ]);
    });

    it('should reject on an error status without reporting progress', async () => {
        const onProgress = jest.fn();

        await expect(
            transport().fetchSegment(request(0, 'missing'), onProgress, new AbortController().signal)
        ).rejects.toThrow('Request failed with status code 404');
        expect(onProgress).not.toHaveBeenCalled();
    });

    it('should stop when the transfer is aborted', async () => {
        const transfer = new AbortController();
        const onProgress = jest.fn();

        const pending = transport().fetchSegment(request(0, 'slow'), onProgress, transfer.signal);
        setTimeout(() => transfer.abort(), 20);

        await expect(pending).rejects.toThrow('canceled');
        expect(onProgress).not.toHaveBeenCalled();
    });
});
