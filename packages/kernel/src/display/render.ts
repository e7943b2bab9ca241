/**
 * Switchboard Kernel - Option Display
 *
 * Renders options as text lines in one of several styles. Rendering is pure:
 * callers decide where the lines go.
 *
 * Listing applies three filters in order:
 *   1. the access class's visibility filter;
 *   2. key availability (Short needs a letter, every other style a name);
 *   3. the caller's set of values to hide.
 */

import type { OptionRegistry } from '../registry/option-registry.js';
import { hiddenFilterFor } from '../types/access.js';
import type { AccessClass } from '../types/access.js';
import type { OptionDescriptor, OptionValue } from '../types/option.js';
import { readOption } from '../values/accessor.js';

export enum DisplayStyle {
  /** `name<pad>\ton|off` */
  OnOff = 'on_off',
  /** `set -X` / `set +X` */
  Short = 'short',
  /** `set -o name` / `set +o name` */
  SetO = 'set_o',
  /** `shopt -s name` / `shopt -u name` */
  Shopt = 'shopt',
  /** OnOff plus the letter form. */
  Help1 = 'help1',
  /** Help1 plus the read-only note and help text. */
  Help2 = 'help2',
  /** Help2 plus display, query and toggle recipes. */
  Help3 = 'help3',
}

/** Width the option name is padded to in OnOff style. */
export const NAME_COLUMN_WIDTH = 23;

function isOn(value: OptionValue): boolean {
  return value > 0;
}

function flagChar(value: OptionValue): string {
  return isOn(value) ? '-' : '+';
}

function onOffLine(name: string, value: OptionValue): string {
  return `${name.padEnd(NAME_COLUMN_WIDTH)}\t${isOn(value) ? 'on' : 'off'}`;
}

function help1(option: OptionDescriptor, value: OptionValue): string[] {
  if (option.name !== undefined) {
    const base = onOffLine(option.name, value);
    return [option.letter !== undefined ? `${base}\t${flagChar(value)}${option.letter}` : base];
  }
  if (option.letter !== undefined) return [`${flagChar(value)}${option.letter}`];
  return ['(This option has no name)'];
}

function help2(option: OptionDescriptor, value: OptionValue): string[] {
  const lines = ['', ...help1(option, value)];
  if (option.flags.readOnly) {
    lines.push('', '\t(This option is read-only.)');
  }
  if (option.help !== undefined && option.help !== '') {
    for (const line of option.help.split('\n')) {
      lines.push(`\t${line}`);
    }
  }
  return lines;
}

function help3(option: OptionDescriptor, value: OptionValue): string[] {
  const lines = help2(option, value);
  const { name, letter, flags } = option;

  if (name !== undefined) {
    lines.push('', '\tDisplay:', `\t\tshopt -p ${name}`);
  }

  lines.push('', '\tQuery:');
  if (name !== undefined) {
    lines.push(`\t\tshopt -q ${name}`);
    if (flags.bashopts) lines.push(`\t\t[[ :$BASHOPTS: = *:${name}:* ]]`);
    if (flags.shellopts) lines.push(`\t\t[[ :$SHELLOPTS: = *:${name}:* ]]`);
  }
  if (letter !== undefined) lines.push(`\t\t[[ $- = *'${letter}'* ]]`);

  if (!flags.readOnly) {
    lines.push('', '\tTurn on:');
    if (name !== undefined) lines.push(`\t\tshopt -s ${name}`, `\t\tset -o ${name}`);
    if (letter !== undefined) lines.push(`\t\tset -${letter}`);

    lines.push('', '\tTurn off:');
    if (name !== undefined) lines.push(`\t\tshopt -u ${name}`, `\t\tset +o ${name}`);
    if (letter !== undefined) lines.push(`\t\tset +${letter}`);
  }
  return lines;
}

/**
 * Render one option. The value is read under `access`.
 * Styles that need a key the option lacks render nothing.
 */
export function renderOption(
  option: OptionDescriptor,
  access: AccessClass,
  style: DisplayStyle,
): string[] {
  const value = readOption(option, access);
  switch (style) {
    case DisplayStyle.OnOff:
      return option.name !== undefined ? [onOffLine(option.name, value)] : [];
    case DisplayStyle.Short:
      return option.letter !== undefined ? [`set ${flagChar(value)}${option.letter}`] : [];
    case DisplayStyle.SetO:
      return option.name !== undefined ? [`set ${flagChar(value)}o ${option.name}`] : [];
    case DisplayStyle.Shopt:
      return option.name !== undefined
        ? [`shopt -${isOn(value) ? 's' : 'u'} ${option.name}`]
        : [];
    case DisplayStyle.Help1:
      return help1(option, value);
    case DisplayStyle.Help2:
      return help2(option, value);
    case DisplayStyle.Help3:
      return help3(option, value);
  }
}

/**
 * Render every option visible to `access` in `style`.
 *
 * @param hideValues - Options whose current value is in this set are skipped
 *   (e.g. `shopt -s` lists only enabled options by hiding 0).
 */
export function listOptions(
  registry: OptionRegistry,
  access: AccessClass,
  style: DisplayStyle,
  hideValues?: ReadonlySet<OptionValue>,
): string[] {
  const lines: string[] = [];
  for (const option of registry.enumerate(hiddenFilterFor(access))) {
    const hasKey = style === DisplayStyle.Short ? option.letter !== undefined : option.name !== undefined;
    if (!hasKey) continue;
    if (hideValues !== undefined && hideValues.has(readOption(option, access))) continue;
    lines.push(...renderOption(option, access, style));
  }
  return lines;
}
