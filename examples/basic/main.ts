/**
 * Maps a small data series onto a 100x100 SVG viewport and prints the resulting polyline.
 *
 * Run with any TypeScript loader, e.g. `tsx examples/basic/main.ts`.
 */

import { createAxisTransform } from '../../src/index';

const transform = createAxisTransform({
  canvas: [10, 10, 100, 100],
  data: [-100, -100, 100, 100],
});

const xs = [-100, -10, 0, 20, 40, 60, 80, 100];
const ys = [-100, -10, 0, 20, 40, 60, 80, 100];

const [px, py] = transform.map(xs, ys);
const points = px.map((x, i) => `${x.toFixed(2)},${(py[i] ?? Number.NaN).toFixed(2)}`).join(' ');

console.log(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 110 110">`);
console.log(`  <polyline fill="none" stroke="black" points="${points}" />`);
console.log(`</svg>`);
