import Handlebars from 'handlebars';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/** Template shipped with the package, resolved beside `src/`. */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../templates/index.hbs', import.meta.url));

export const DEFAULT_PAGE_TITLE = 'Token Generator';

export interface IndexPageOptions {
  /** Greeting shown above the form (HTML-escaped by the template) */
  welcome: string;
  /** Document title */
  title?: string;
  /** Override the Handlebars template file, mainly for tests */
  templatePath?: string;
}

interface IndexViewModel {
  welcome: string;
  title: string;
}

type IndexTemplate = (viewModel: IndexViewModel) => string;

const compiledTemplates = new Map<string, Promise<IndexTemplate>>();

/**
 * Render the landing page: a form that posts text to `/tokens` and a
 * button that fetches a single token from `/generate`.
 *
 * Templates are compiled once per path; a failed load is not cached.
 */
export async function renderIndexPage(options: IndexPageOptions): Promise<string> {
  const template = await loadTemplate(options.templatePath ?? DEFAULT_TEMPLATE_PATH);
  return template({
    welcome: options.welcome,
    title: options.title ?? DEFAULT_PAGE_TITLE,
  });
}

function loadTemplate(templatePath: string): Promise<IndexTemplate> {
  const cached = compiledTemplates.get(templatePath);
  if (cached) return cached;

  const pending = readFile(templatePath, 'utf-8').then(
    (source): IndexTemplate => Handlebars.compile<IndexViewModel>(source),
  );
  compiledTemplates.set(templatePath, pending);
  pending.catch(() => compiledTemplates.delete(templatePath));
  return pending;
}
