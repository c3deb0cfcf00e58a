/**
 * Template Rendering
 *
 * Launch scripts and the Makefile are rendered from mustache templates.
 * Variables are passed as fixed records so a missing one is a compile
 * error rather than an empty substitution.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import Mustache from 'mustache';
import { TemplateRenderError, type PackSettings } from '@jarpack/core';
import { resolveFrom } from '@jarpack/utils';

const BUNDLED_TEMPLATE_DIR = fileURLToPath(new URL('../templates/', import.meta.url));

export const DEFAULT_TEMPLATES = {
  bash: `${BUNDLED_TEMPLATE_DIR}launch.mustache`,
  bat: `${BUNDLED_TEMPLATE_DIR}launch-bat.mustache`,
  makefile: `${BUNDLED_TEMPLATE_DIR}Makefile.mustache`,
} as const;

export interface LauncherTemplateVars {
  PROG_NAME: string;
  PROG_VERSION: string;
  MAIN_CLASS: string;
  MAC_ICON_FILE: string;
  /** Space-separated, each option double-quoted */
  JVM_OPTS: string;
  EXTRA_CLASSPATH: string;
  /** Only set when the expanded classpath mode is on */
  EXPANDED_CLASSPATH?: string;
}

export interface MakefileTemplateVars {
  PROG_NAME: string;
  PROG_SYMLINK: string;
}

export type TemplateVars = LauncherTemplateVars | MakefileTemplateVars;

export interface TemplateRenderer {
  render(templatePath: string, vars: TemplateVars): Promise<string>;
}

export interface TemplatePaths {
  bash: string;
  bat: string;
  makefile: string;
}

/**
 * Template files to render; custom paths are taken relative to `baseDir`
 */
export function resolveTemplatePaths(settings: PackSettings, baseDir: string): TemplatePaths {
  const custom = (path: string | undefined, fallback: string): string =>
    path !== undefined ? resolveFrom(baseDir, path) : fallback;
  return {
    bash: custom(settings.bashTemplate, DEFAULT_TEMPLATES.bash),
    bat: custom(settings.batTemplate, DEFAULT_TEMPLATES.bat),
    makefile: custom(settings.makefileTemplate, DEFAULT_TEMPLATES.makefile),
  };
}

/**
 * Reads templates from disk and renders them with mustache.
 * Use triple braces in templates: double braces HTML-escape the value.
 */
export class MustacheTemplateRenderer implements TemplateRenderer {
  private readonly cache = new Map<string, string>();

  async render(templatePath: string, vars: TemplateVars): Promise<string> {
    try {
      const template = await this.load(templatePath);
      return Mustache.render(template, vars);
    } catch (error) {
      throw new TemplateRenderError(templatePath, error);
    }
  }

  private async load(templatePath: string): Promise<string> {
    const cached = this.cache.get(templatePath);
    if (cached !== undefined) {
      return cached;
    }
    const template = await readFile(templatePath, 'utf8');
    this.cache.set(templatePath, template);
    return template;
  }
}
