export { InputValidator } from './InputValidator';
