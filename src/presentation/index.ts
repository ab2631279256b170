export {
  SECRET_KEY_WARNING,
  parseOutputFormat,
  toWalletData,
  renderWalletText,
  renderWalletJson,
  renderWallet,
} from './format.js';
