export {
  cleanString,
  isBlank,
  lowercase,
  completenessScore,
  uniqueInOrder,
} from './basic'
export {
  parseDateOrNull,
  parseDateComponents,
  formatIso,
  isValidDate,
  type DateComponents,
} from './date'
export { isValidEmail, normalizeEmail } from './email'
export { parseAmount, formatCurrency } from './currency'
export { normalizeTitle } from './title'
