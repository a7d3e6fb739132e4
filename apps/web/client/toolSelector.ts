/**
* Tool cards on the form page. The active card decides the hidden
* analysis_type value and which feature list is visible.
*/

export function selectTool(root: Document, card: HTMLElement): void {
  const toolType = card.dataset['tool'];
  if (!toolType) return;

  root.querySelectorAll<HTMLElement>('.tool-card').forEach(c => c.classList.remove('active'));
  card.classList.add('active');

  const input = root.getElementById('analysis_type');
  if (input instanceof HTMLInputElement) {
    input.value = toolType;
  }

  root.querySelectorAll<HTMLElement>('.feature-list').forEach(list => {
    list.hidden = list.id !== `${toolType}-features`;
  });
}

export function initToolSelector(root: Document = document): void {
  root.querySelectorAll<HTMLElement>('.tool-card').forEach(card => {
    card.addEventListener('click', () => selectTool(root, card));
  });
}
