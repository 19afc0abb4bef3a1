import { DOMMatrix, ImageData, Path2D } from '@napi-rs/canvas';

// pdf.js looks these up on the global object when it loads under Node.
if (!('DOMMatrix' in globalThis)) Object.assign(globalThis, { DOMMatrix });
if (!('ImageData' in globalThis)) Object.assign(globalThis, { ImageData });
if (!('Path2D' in globalThis)) Object.assign(globalThis, { Path2D });
