import { escapeHtml, safeUrl } from '../../utils/html.js';
import type { StaticTemplate, TemplateRenderContext } from '../TemplateRegistry.js';
import { htmlDocument } from './layout.js';
import { renderSection } from './sections.js';

const SIZE = { width: 1200, height: 1600 } as const;

const STYLES = `
.page { max-width: 1100px; margin: 0 auto; padding: var(--space-xl); }
.masthead { display: flex; justify-content: space-between; align-items: center; margin-bottom: var(--space-xl); }
.brand-name { font-size: 28px; font-weight: 700; color: var(--color-primary); }
.website { color: var(--color-text); opacity: 0.7; text-decoration: none; }
.hero { display: grid; grid-template-columns: 1.1fr 1fr; gap: var(--space-xl); align-items: center; margin-bottom: var(--space-xl); }
.hero h1 { font-size: 56px; }
.hero .subtitle { font-size: 22px; color: var(--color-primary); }
.hero-image { width: 100%; height: 340px; border-radius: var(--radius-lg); }
section { margin-bottom: var(--space-xl); }
.text-block { background: var(--color-muted); border-radius: var(--radius-md); padding: var(--space-lg); }
.grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: var(--space-md); }
.card { border: 1px solid var(--color-muted); border-radius: var(--radius-md); padding: var(--space-md); }
.card-image { width: 100%; height: 120px; border-radius: var(--radius-sm); margin-bottom: var(--space-sm); }
.icon { font-size: 24px; }
.benefits ul { columns: 2; padding-left: var(--space-lg); }
.steps { display: grid; grid-template-columns: repeat(3, 1fr); gap: var(--space-md); list-style: none; padding: 0; }
.step-image { width: 100%; height: 140px; border-radius: var(--radius-sm); }
.step-number { display: inline-block; color: var(--color-secondary); font-weight: 700; font-size: 20px; }
.testimonial { display: flex; gap: var(--space-md); align-items: center; margin: 0 0 var(--space-md); }
.avatar { width: 72px; height: 72px; border-radius: 50%; }
blockquote { margin: 0; font-style: italic; }
figcaption { opacity: 0.7; }
.closing { text-align: center; padding: var(--space-xl); background: var(--color-primary); color: var(--color-on-primary); border-radius: var(--radius-lg); }
.closing .cta { background: var(--color-bg); color: var(--color-primary); }`;

function render({ brand, content, images, tokens }: TemplateRenderContext): string {
  const website = brand.website === undefined ? undefined : safeUrl(brand.website);
  const sections = content.sections.map(section => renderSection(section, images, content.callToAction)).join('\n');
  const body = `<main class="page">
<header class="masthead">
  <span class="brand-name">${escapeHtml(brand.name)}</span>
  ${website ? `<a class="website" href="${escapeHtml(website)}">${escapeHtml(website.replace(/^https?:\/\//, ''))}</a>` : ''}
</header>
${sections}
<footer class="closing" id="contact">
  <h2>${escapeHtml(content.hero.title)}</h2>
  <a class="cta" href="${escapeHtml(website ?? '#')}">${escapeHtml(content.callToAction)}</a>
</footer>
</main>`;

  return htmlDocument({
    title: `${brand.name} - ${content.hero.title}`,
    tokens,
    canvas: SIZE,
    styles: STYLES,
    body,
  });
}

/**
 * Long-form marketing one-pager with every section of the document.
 */
export const onepagerTemplate: StaticTemplate = {
  name: 'onepager',
  description: 'Marketing one-pager with hero, sections and closing call to action',
  defaultSize: SIZE,
  render,
};
