import type {ConversionSettings} from '../options';
import {makeMetadataArgs, makePhotoFilterSpec} from './filters';
import {extensionOf} from './media';
import {clamp} from './utils';

/**
 * Maps 1-100 quality to jpeg's `-q:v` scale, where 2 is best and 31 worst.
 */
export const jpegQScale = (quality: number) => clamp(2, Math.round(31 - (quality / 100) * 29), 31);

/**
 * ffmpeg arguments (without the binary) converting one photo.
 */
export function buildPhotoArgs(inputPath: string, outputPath: string, settings: ConversionSettings): string[] {
	const spec = makePhotoFilterSpec(settings);
	const args = [settings.overwrite ? '-y' : '-n', '-i', inputPath];

	if (spec.type === 'complex') {
		if (spec.watermarkInput) args.push('-i', spec.watermarkInput);
		args.push('-filter_complex', spec.graph, '-map', spec.outputLabel);
	} else if (spec.type === 'simple') {
		args.push('-vf', spec.chain);
	}

	args.push(...makeMetadataArgs(settings.metadata));

	const extension = extensionOf(outputPath);
	const quality = Math.trunc(settings.photoQuality);
	if (extension === 'jpg' || extension === 'jpeg') args.push('-q:v', `${jpegQScale(quality)}`);
	else if (extension === 'webp') args.push('-q:v', `${clamp(0, quality, 100)}`);

	args.push(outputPath);
	return args;
}
