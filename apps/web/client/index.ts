import { initToolSelector } from './toolSelector';
import { initUrlValidation } from './urlValidation';

initToolSelector();
initUrlValidation();
