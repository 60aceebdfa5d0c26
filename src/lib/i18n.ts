import {LANGUAGES, Language} from '../config';
import en from '../locales/en.json';
import uk from '../locales/uk.json';
import ru from '../locales/ru.json';
import pt from '../locales/pt.json';

export type MessageKey = keyof typeof en;
export type Catalog = Partial<Record<MessageKey, string>>;
export type Variables = Record<string, string | number>;
export type Translate = (key: MessageKey, variables?: Variables) => string;

const catalogs: Record<Language, Catalog> = {en, uk, ru, pt};

export const isLanguage = (value: unknown): value is Language =>
	typeof value === 'string' && LANGUAGES.some((language) => language === value);

/**
 * Replaces `{name}` placeholders. Unknown placeholders are left as they are.
 * ```
 * interpolate('Added: {count}', {count: 3}); // 'Added: 3'
 * ```
 */
export function interpolate(template: string, variables: Variables = {}) {
	return template.replace(/\{(\w+)\}/g, (match, name: string) =>
		Object.hasOwn(variables, name) ? `${variables[name]}` : match
	);
}

/**
 * Creates a translate function for a language. Missing messages fall back to
 * english, and then to the key itself.
 */
export function makeTranslator(language: Language = 'en'): Translate {
	const catalog = catalogs[language];
	return (key, variables) => interpolate(catalog[key] ?? catalogs.en[key] ?? key, variables);
}
