import { isValidHttpUrl } from '@utils/url';

export { isValidHttpUrl };

export const EMPTY_URL_MESSAGE = 'Please enter a URL';
export const INVALID_URL_MESSAGE = 'Please enter a valid URL (e.g. https://example.com)';
export const DEFAULT_LOADING_MESSAGE = 'Analyzing...';

/**
* Replace any previous inline error with `message`, placed before the form
*/
export function showError(form: HTMLFormElement, message: string): HTMLElement {
  const doc = form.ownerDocument;
  doc.querySelectorAll('.error-message').forEach(el => el.remove());

  const errorDiv = doc.createElement('div');
  errorDiv.className = 'error-message';
  errorDiv.setAttribute('role', 'alert');
  const text = doc.createElement('p');
  text.textContent = message;
  errorDiv.appendChild(text);

  form.parentNode?.insertBefore(errorDiv, form);
  return errorDiv;
}

/**
* Loading message of the active tool card, if it carries one
*/
export function loadingMessageFor(doc: Document, analysisType: string): string {
  for (const card of doc.querySelectorAll<HTMLElement>('.tool-card')) {
    if (card.dataset['tool'] === analysisType && card.dataset['loadingMessage']) {
      return card.dataset['loadingMessage'];
    }
  }
  return DEFAULT_LOADING_MESSAGE;
}

export function showLoading(form: HTMLFormElement, message: string): void {
  const button = form.querySelector('button[type="submit"]');
  if (button instanceof HTMLButtonElement) {
    button.disabled = true;
    button.textContent = message;
  }
  form.style.opacity = '0.7';
  form.style.pointerEvents = 'none';
}

/**
* Submit handler: blocks empty and non-HTTP(S) URLs, otherwise lets the
* browser submit and shows the loading state.
* @returns Whether the submission may proceed
*/
export function handleSubmit(form: HTMLFormElement, event: Event): boolean {
  const urlInput = form.querySelector('#url');
  const url = urlInput instanceof HTMLInputElement ? urlInput.value.trim() : '';

  if (!url) {
    event.preventDefault();
    showError(form, EMPTY_URL_MESSAGE);
    return false;
  }
  if (!isValidHttpUrl(url)) {
    event.preventDefault();
    showError(form, INVALID_URL_MESSAGE);
    return false;
  }

  const typeInput = form.querySelector('#analysis_type');
  const analysisType = typeInput instanceof HTMLInputElement ? typeInput.value : '';
  showLoading(form, loadingMessageFor(form.ownerDocument, analysisType));
  return true;
}

export function initUrlValidation(root: Document = document): void {
  const form = root.querySelector('.analysis-form form');
  if (!(form instanceof HTMLFormElement)) return;
  form.addEventListener('submit', event => {
    handleSubmit(form, event);
  });
}
