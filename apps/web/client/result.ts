import { initResultSections } from './resultSections';
import { initTableSort } from './tableSort';

initResultSections();
initTableSort();
