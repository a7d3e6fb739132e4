/**
* Result page interactions: one detail section open at a time, collapsible
* blocks and printing.
*/

export function toggleSection(root: Document, sectionId: string): boolean {
  const target = root.getElementById(sectionId);
  if (!target) return false;

  const wasVisible = !target.hidden;
  root.querySelectorAll<HTMLElement>('.detailed-section').forEach(section => {
    section.hidden = true;
  });
  root.querySelectorAll<HTMLElement>('.section-toggle').forEach(button => {
    button.classList.toggle('active', !wasVisible && button.dataset['section'] === sectionId);
  });

  if (wasVisible) return false;

  target.hidden = false;
  if (typeof target.scrollIntoView === 'function') {
    target.scrollIntoView({ behavior: 'smooth', block: 'start' });
  }
  return true;
}

export function toggleExpand(root: Document, button: HTMLElement): boolean {
  const targetId = button.dataset['target'];
  const target = targetId ? root.getElementById(targetId) : null;
  if (!target) return false;

  const expanded = target.classList.toggle('expanded');
  button.classList.toggle('expanded', expanded);
  button.setAttribute('aria-expanded', String(expanded));
  button.textContent = expanded ? 'Hide details' : 'Show details';
  return expanded;
}

export function initResultSections(root: Document = document, print: () => void = () => window.print()): void {
  root.querySelectorAll<HTMLElement>('.section-toggle').forEach(button => {
    button.addEventListener('click', () => {
      const id = button.dataset['section'];
      if (id) toggleSection(root, id);
    });
  });

  root.querySelectorAll<HTMLElement>('.expand-button[data-target]').forEach(button => {
    button.addEventListener('click', () => {
      toggleExpand(root, button);
    });
  });

  root.getElementById('print-results')?.addEventListener('click', () => print());
}
