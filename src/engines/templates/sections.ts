import type { ResolvedImageSet, Section, SectionOf } from '../../types/index.js';
import { escapeHtml, safeUrl } from '../../utils/html.js';

function image(url: string | undefined, alt: string, className: string): string {
  const src = url === undefined ? undefined : safeUrl(url);
  return src ? `<img class="${className}" src="${escapeHtml(src)}" alt="${escapeHtml(alt)}">` : '';
}

function renderHero(section: SectionOf<'hero'>, images: ResolvedImageSet, callToAction: string): string {
  const { title, subtitle, description } = section.payload;
  return `<section class="hero" id="${escapeHtml(section.id)}">
  <div class="hero-copy">
    <h1 class="headline">${escapeHtml(title)}</h1>
    <p class="subtitle">${escapeHtml(subtitle)}</p>
    <p class="description">${escapeHtml(description)}</p>
    <a class="cta" href="#contact">${escapeHtml(callToAction)}</a>
  </div>
  ${image(images.hero[0], title, 'hero-image')}
</section>`;
}

function renderText(section: SectionOf<'value-prop' | 'about' | 'social-proof'>): string {
  return `<section class="text-block ${section.kind}" id="${escapeHtml(section.id)}">
  <h2>${escapeHtml(section.payload.title)}</h2>
  <p>${escapeHtml(section.payload.text)}</p>
</section>`;
}

function renderFeatures(section: SectionOf<'features'>, images: ResolvedImageSet): string {
  const cards = section.payload.items
    .map(
      (feature, index) => `<div class="card">
    ${image(images.features[index], feature.title, 'card-image')}
    <span class="icon">${escapeHtml(feature.icon)}</span>
    <h3>${escapeHtml(feature.title)}</h3>
    <p>${escapeHtml(feature.description)}</p>
  </div>`
    )
    .join('\n  ');
  return `<section class="features" id="${escapeHtml(section.id)}">
  <h2>${escapeHtml(section.payload.title)}</h2>
  <div class="grid">
  ${cards}
  </div>
</section>`;
}

function renderBenefits(section: SectionOf<'benefits'>): string {
  const items = section.payload.items.map(item => `<li>${escapeHtml(item)}</li>`).join('');
  return `<section class="benefits" id="${escapeHtml(section.id)}">
  <h2>${escapeHtml(section.payload.title)}</h2>
  <ul>${items}</ul>
</section>`;
}

function renderProcess(section: SectionOf<'process'>, images: ResolvedImageSet): string {
  const steps = section.payload.steps
    .map(
      (step, index) => `<li class="step">
    ${image(images.process[index], step.title, 'step-image')}
    <span class="step-number">${step.step}</span>
    <h3>${escapeHtml(step.title)}</h3>
    <p>${escapeHtml(step.description)}</p>
  </li>`
    )
    .join('\n  ');
  return `<section class="process" id="${escapeHtml(section.id)}">
  <h2>${escapeHtml(section.payload.title)}</h2>
  <ol class="steps">
  ${steps}
  </ol>
</section>`;
}

function renderTestimonials(section: SectionOf<'testimonials'>, images: ResolvedImageSet): string {
  const quotes = section.payload.items
    .map((item, index) => {
      const byline = [item.author, item.role, item.company].filter(Boolean).map(part => escapeHtml(part ?? '')).join(', ');
      return `<figure class="testimonial">
    ${image(images.testimonials[index], item.author, 'avatar')}
    <blockquote>${escapeHtml(item.quote)}</blockquote>
    <figcaption>${byline}</figcaption>
  </figure>`;
    })
    .join('\n  ');
  return `<section class="testimonials" id="${escapeHtml(section.id)}">
  <h2>${escapeHtml(section.payload.title)}</h2>
  ${quotes}
</section>`;
}

/**
 * Renders one content section to markup.
 */
export function renderSection(section: Section, images: ResolvedImageSet, callToAction: string): string {
  switch (section.kind) {
    case 'hero':
      return renderHero(section, images, callToAction);
    case 'value-prop':
    case 'about':
    case 'social-proof':
      return renderText(section);
    case 'features':
      return renderFeatures(section, images);
    case 'benefits':
      return renderBenefits(section);
    case 'process':
      return renderProcess(section, images);
    case 'testimonials':
      return renderTestimonials(section, images);
  }
}
