import i18n from 'i18next';
import { initReactI18next } from 'react-i18next';
import { createLogger } from '../lib/logger';
import enUS from './en-US.json';
import de from './de.json';

const log = createLogger('i18n');

export const SUPPORTED_LANGUAGES = ['en-US', 'de'] as const;

// Flag to track if i18n has been initialized
let initialized = false;

/**
 * Initialize i18n with react-i18next.
 * Safe to call multiple times; later calls only switch the language.
 * Resources are bundled, so translations are usable as soon as this returns.
 */
export function initI18n(language = 'en-US') {
  if (initialized) {
    if (i18n.language !== language) {
      i18n.changeLanguage(language).catch((error: unknown) => {
        log.error(`Could not switch language to ${language}`, error);
      });
    }
    return i18n;
  }

  i18n
    .use(initReactI18next)
    .init({
      resources: {
        'en-US': { translation: enUS },
        de: { translation: de },
      },
      lng: language,
      fallbackLng: 'en-US',
      initImmediate: false,
      interpolation: {
        escapeValue: false, // Ink renders plain text
      },
    })
    .catch((error: unknown) => {
      log.error('i18n initialization failed', error);
    });

  initialized = true;
  return i18n;
}

// Export the i18n instance for direct usage
export default i18n;

// Re-export commonly used hooks and functions from react-i18next
export { useTranslation, I18nextProvider } from 'react-i18next';
