export { compareRotation, rankItems, selectNext } from './selector.js';
