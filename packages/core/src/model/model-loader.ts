import { readFileSync, readdirSync } from 'fs';
import { join, extname, basename } from 'path';
import yaml from 'js-yaml';
import { ModelLoadError } from '../shared/errors.js';
import { parseModel } from './model-parser.js';
import type { Model, ParseModelOptions } from './types.js';

const MODEL_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

function readDocument(filePath: string): unknown {
  const ext = extname(filePath).toLowerCase();
  if (!MODEL_EXTENSIONS.has(ext)) {
    throw new ModelLoadError(
      filePath,
      `unsupported model file format: ${ext || '(none)'} (expected .json, .yaml, or .yml)`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ModelLoadError(filePath, 'file could not be read', error);
  }

  try {
    return ext === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(filePath, reason, error);
  }
}

/**
 * Load a single model from a YAML or JSON file.
 * Shape problems surface as the parser's ValidationError.
 */
export function loadModelFromFile(filePath: string, options?: ParseModelOptions): Model {
  return parseModel(readDocument(filePath), options);
}

/**
 * Load every model file in a directory, keyed by file name, in sorted order.
 */
export function loadModelsFromDirectory(
  dirPath: string,
  options?: ParseModelOptions,
): Record<string, Model> {
  const files = readdirSync(dirPath)
    .filter((f) => MODEL_EXTENSIONS.has(extname(f).toLowerCase()))
    .sort();

  const models: Record<string, Model> = {};
  for (const file of files) {
    models[basename(file)] = loadModelFromFile(join(dirPath, file), options);
  }
  return models;
}
