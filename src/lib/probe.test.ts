import {promises as FSP} from 'fs';
import * as OS from 'os';
import * as Path from 'path';
import {describe, expect, it} from 'vitest';
import {describeMedia, fromProbedMeta, fromSharpMetadata, makeProbe} from './probe';

describe('fromProbedMeta()', () => {
	it('maps video meta', () => {
		expect(
			fromProbedMeta({
				type: 'video',
				codec: 'h264',
				container: 'mov,mp4,m4a,3gp,3g2,mj2',
				size: 2048,
				duration: 65000,
				width: 1920,
				height: 1080,
				audioStreams: [{codec: 'aac'}, {codec: 'mp3'}],
			})
		).toEqual({
			container: 'mov,mp4,m4a,3gp,3g2,mj2',
			size: 2048,
			videoCodec: 'h264',
			audioCodec: 'aac',
			duration: 65000,
			width: 1920,
			height: 1080,
		});
	});

	it('maps image meta without duration', () => {
		expect(fromProbedMeta({type: 'image', codec: 'png', width: 10, height: 20, duration: 40})).toEqual({
			container: undefined,
			size: undefined,
			videoCodec: 'png',
			width: 10,
			height: 20,
		});
	});
});

describe('fromSharpMetadata()', () => {
	it('describes single frame images', () => {
		expect(fromSharpMetadata({format: 'jpeg', width: 640, height: 480}, 1000, '/a/photo.JPEG')).toEqual({
			videoCodec: 'jpeg',
			width: 640,
			height: 480,
			size: 1000,
			container: 'jpg',
		});
	});

	it('leaves animations and incomplete metadata to ffprobe', () => {
		expect(fromSharpMetadata({format: 'webp', width: 64, height: 64, pages: 12}, 1000, '/a.webp')).toBeUndefined();
		expect(fromSharpMetadata({format: 'png'}, 1000, '/a.png')).toBeUndefined();
	});
});

describe('makeProbe()', () => {
	it('resolves undefined without ffprobe', async () => {
		const dir = await FSP.mkdtemp(Path.join(OS.tmpdir(), 'probe-test-'));
		try {
			const path = Path.join(dir, 'broken.jpg');
			await FSP.writeFile(path, 'not an image');
			const probe = makeProbe({});
			expect(await probe(path, 'photo')).toBeUndefined();
			expect(await probe(Path.join(dir, 'clip.mp4'), 'video')).toBeUndefined();
		} finally {
			await FSP.rm(dir, {recursive: true, force: true});
		}
	});
});

describe('describeMedia()', () => {
	it('summarizes in one line', () => {
		expect(
			describeMedia('clip.mp4', {
				duration: 65000,
				videoCodec: 'h264',
				audioCodec: 'aac',
				width: 1920,
				height: 1080,
				size: 1572864,
			})
		).toBe('clip.mp4: 01:05 | h264/aac | 1920x1080 | 1.5 MB');
		expect(describeMedia('a.png', {})).toBe('a.png: --:-- | -/- | -x- | --');
	});
});
