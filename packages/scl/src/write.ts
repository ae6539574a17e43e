import { renderPitch, validateScale, type Scale } from '@tunekit/core';
import { ScaleValidationError } from './errors.js';
import { StringSink, type ScaleSink } from './source.js';

const encoder = new TextEncoder();

/**
 * Writes `scale` to `sink` in `.scl` format, one `write` call per line.
 * A non-empty `name` is written first as the customary `! <name>` header.
 * Comments present when the scale was read are not reproduced.
 */
export const writeScale = (sink: ScaleSink, scale: Scale, name = ''): void => {
  const issues = validateScale(scale);
  if (issues.length > 0) throw new ScaleValidationError(issues);
  if (/[\r\n]/.test(name)) throw new Error('Scale name must fit on a single line.');

  if (name !== '') {
    sink.write(`! ${name}\n`);
    sink.write('!\n');
  }
  sink.write(`${scale.description}\n`);
  sink.write(` ${scale.pitches.length}\n`);
  for (const pitch of scale.pitches) {
    sink.write(` ${renderPitch(pitch)}\n`);
  }
};

export const serializeScale = (scale: Scale, name = ''): string => {
  const sink = new StringSink();
  writeScale(sink, scale, name);
  return sink.toString();
};

export const encodeScale = (scale: Scale, name = ''): Uint8Array => encoder.encode(serializeScale(scale, name));
