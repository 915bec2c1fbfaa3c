import test from 'node:test';
import assert from 'node:assert/strict';

import { buildSolarDiagram, projectSolarDiagram } from '../solarDiagram';

function close(actual: number, expected: number, eps = 1e-9) {
  assert.ok(Math.abs(actual - expected) < eps, `expected ${expected}, got ${actual}`);
}

test('bodies sit at evenly spaced angles around the Sun', () => {
  const { points, title } = buildSolarDiagram();
  assert.equal(title, 'Simplified Solar System Plane (Not to Scale)');
  assert.deepEqual(
    points.map(p => p.name),
    ['Sun', 'Mercury', 'Venus', 'Earth', 'Mars', 'Jupiter', 'Saturn', 'Uranus', 'Neptune'],
  );

  const sun = points[0];
  assert.equal(sun.x, 0);
  assert.equal(sun.y, 0);

  const earth = points[3];
  close(earth.theta, (2 * Math.PI) / 3);
  close(earth.x, -0.5);
  close(earth.y, Math.sqrt(3) / 2);
});

test('only the primary body is flagged as focus', () => {
  const focused = buildSolarDiagram('Saturn').points.filter(p => p.focus).map(p => p.name);
  assert.deepEqual(focused, ['Saturn']);
});

test('the Moon and a missing focus highlight nothing', () => {
  assert.equal(buildSolarDiagram('Moon').points.some(p => p.focus), false);
  assert.equal(buildSolarDiagram().points.some(p => p.focus), false);
});

test('projection centres the Sun and keeps a square aspect', () => {
  const projected = projectSolarDiagram(buildSolarDiagram('Sun'), 200, 100);
  const sun = projected[0];
  assert.deepEqual(sun, { name: 'Sun', px: 100, py: 50, r: 15, focus: true });

  // Neptune has the largest |x| so it lands on the right edge of the 100px square
  const neptune = projected[8];
  close(neptune.px, 150);
  assert.ok(neptune.py > 50, 'southern half of the plane maps below the centre');
});
