/**
 * Render an ancestry path as text, one line per hop plus the final person:
 *
 *   Name A(20) is Father of
 *   Name B(6) is Father of
 *   Name C(1)
 */

import type { AncestryPath, PathStep } from '@heritage-pathfind/shared';

type Paint = (text: string) => string;

export interface PathStyle {
  name: Paint;
  label: Paint;
  kind: Paint;
}

export interface RenderOptions {
  unknownName?: string;
  style?: Partial<PathStyle>;
}

const plain: Paint = (text) => text;

export const DEFAULT_UNKNOWN_NAME = 'Unknown';

// age when the dataset gives one, the identifier otherwise
export const personLabel = (step: PathStep): string =>
  step.age !== undefined ? String(step.age) : step.id;

export function renderStep(step: PathStep, options: RenderOptions = {}): string {
  const name = options.style?.name ?? plain;
  const label = options.style?.label ?? plain;
  const kind = options.style?.kind ?? plain;

  const person = `${name(step.name ?? options.unknownName ?? DEFAULT_UNKNOWN_NAME)}(${label(personLabel(step))})`;
  return step.kind === undefined ? person : `${person} is ${kind(step.kind)} of`;
}

export function renderPath(path: AncestryPath, options: RenderOptions = {}): string[] {
  const last = path.steps.length - 1;
  return path.steps.map((step, i) =>
    renderStep(i === last ? { ...step, kind: undefined } : step, options)
  );
}

export default renderPath;
