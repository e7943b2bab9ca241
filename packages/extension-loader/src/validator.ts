/**
 * Switchboard Extension Loader - Manifest Validator
 *
 * Validates extension manifests before anything is registered:
 *
 * - extension_id, extension_name and version are well-formed;
 * - every option has at least one key and every key is well-formed;
 * - no two options of the manifest share a name or a letter;
 * - default values are integers;
 * - variable and command names are well-formed and unique.
 *
 * Conflicts with options already in the registry are not detected here;
 * the loader finds those when it registers and rolls back.
 */

import {
  isValidLetter,
  isValidOptionName,
  optionLabel,
  type OptionDescriptor,
} from '@switchboard/kernel';
import { isValidVariableName } from '@switchboard/runtime-host';
import type { ExtensionManifest, ValidationError, ValidationResult } from './types.js';

const EXTENSION_ID_PATTERN = /^[a-z][a-z0-9-]*$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?$/;
const COMMAND_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export class ExtensionValidator {
  /**
   * Validate a manifest.
   *
   * @returns the manifest on success, every problem found on failure
   */
  validateManifest(manifest: ExtensionManifest): ValidationResult<ExtensionManifest> {
    const context = `extension_id: ${manifest.extension_id}`;
    const errors: ValidationError[] = [];

    if (!EXTENSION_ID_PATTERN.test(manifest.extension_id)) {
      errors.push({
        message: `Invalid extension_id "${manifest.extension_id}": ` +
          'expected lowercase letters, digits and "-", starting with a letter',
        context,
      });
    }
    if (manifest.extension_name.trim() === '') {
      errors.push({ message: 'extension_name must not be empty', context });
    }
    if (!VERSION_PATTERN.test(manifest.version)) {
      errors.push({ message: `Invalid version "${manifest.version}": expected semver`, context });
    }

    errors.push(...this.validateOptions(manifest.options, context));

    const variableNames = new Set<string>();
    for (const variable of manifest.variables) {
      if (!isValidVariableName(variable.name)) {
        errors.push({ message: `Invalid variable name "${variable.name}"`, context });
      } else if (variableNames.has(variable.name)) {
        errors.push({ message: `Duplicate variable "${variable.name}"`, context });
      }
      variableNames.add(variable.name);
    }

    const commandNames = new Set<string>();
    for (const command of manifest.commands) {
      if (!COMMAND_NAME_PATTERN.test(command.name)) {
        errors.push({ message: `Invalid command name "${command.name}"`, context });
      } else if (commandNames.has(command.name)) {
        errors.push({ message: `Duplicate command "${command.name}"`, context });
      }
      commandNames.add(command.name);
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: manifest };
  }

  /**
   * Validate option keys and defaults, and the uniqueness of keys within
   * the given list.
   */
  validateOptions(
    options: ReadonlyArray<OptionDescriptor>,
    context?: string,
  ): ValidationError[] {
    const errors: ValidationError[] = [];
    const names = new Set<string>();
    const letters = new Set<string>();

    for (const option of options) {
      const { name, letter } = option;
      if (name === undefined && letter === undefined) {
        errors.push({ message: 'Option has neither a name nor a letter', context });
        continue;
      }
      if (name !== undefined) {
        if (!isValidOptionName(name)) {
          errors.push({ message: `Invalid option name "${name}"`, context });
        } else if (names.has(name)) {
          errors.push({ message: `Duplicate option name "${name}"`, context });
        }
        names.add(name);
      }
      if (letter !== undefined) {
        if (!isValidLetter(letter)) {
          errors.push({ message: `Invalid option letter "${letter}"`, context });
        } else if (letters.has(letter)) {
          errors.push({ message: `Duplicate option letter "${letter}"`, context });
        }
        letters.add(letter);
      }
      if (option.defaultValue !== undefined && !Number.isInteger(option.defaultValue)) {
        errors.push({
          message: `Option "${optionLabel(option)}" has a non-integer default ${option.defaultValue}`,
          context,
        });
      }
    }

    return errors;
  }
}
