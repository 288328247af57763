/**
 * transmute-base/email
 */

import {
  defineConverter,
  err,
  isMissing,
  localize,
  ok,
  pipe,
  type Converter,
  type ConversionContext,
  type Maybe,
  type Missing,
} from "transmute";
import { BASE_MESSAGES } from "./messages";
import { anythingToString } from "./text";

const DOMAIN = /^(?:[a-z0-9][a-z0-9-]{0,62}\.)+[a-z]{2,}$/i;
const USERNAME = /^[^ \t\n\r@<>()]+$/i;
const MAILTO = "mailto:";

/**
 * Convert a string to a lower-cased email address. Surrounding whitespace is
 * trimmed (a blank string becomes `null`) and a `mailto:` prefix removed. On
 * failure the value is the lower-cased address.
 *
 * @example
 * ```typescript
 * strToEmail.apply('John@DOE.name');        // ok('john@doe.name')
 * strToEmail.apply('mailto:john@doe.name'); // ok('john@doe.name')
 * strToEmail.apply('john.doe.name');        // err('john.doe.name', 'An email must contain exactly one "@"')
 * strToEmail.apply('root@127.0.0.1');       // err('root@127.0.0.1', 'Invalid domain name')
 * strToEmail.apply('   ');                  // ok(null)
 * ```
 */
export const strToEmail: Converter<Maybe<string>, string | Missing> = defineConverter(
  (value: Maybe<string>, context: ConversionContext) => {
    if (isMissing(value)) return ok(value);
    let email = value.trim().toLowerCase();
    if (!email) return ok(null);
    if (email.startsWith(MAILTO)) email = email.slice(MAILTO.length);

    const at = email.indexOf("@");
    if (at === -1) return err(email, localize(context, BASE_MESSAGES.EMAIL_WITHOUT_AT));
    const username = email.slice(0, at);
    const domain = email.slice(at + 1);
    if (!USERNAME.test(username)) return err(email, localize(context, BASE_MESSAGES.INVALID_USERNAME));
    if (!DOMAIN.test(domain) && domain !== "localhost") {
      return err(email, localize(context, BASE_MESSAGES.INVALID_DOMAIN));
    }
    return ok(email);
  }
);

/**
 * `strToEmail` for any input: present non-string values are stringified
 * first.
 */
export const inputToEmail: Converter<unknown, string | Missing> = pipe(anythingToString, strToEmail);
