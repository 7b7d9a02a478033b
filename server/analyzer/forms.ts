import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { FormDescriptor, LoginFormPolicy } from "./types";

const LOGIN_ACTION_HINTS = ["login", "signin"];
const USERNAME_INPUT_TYPES = ["text", "email"];

function typeOf($: CheerioAPI, el: Element): string {
  return ($(el).attr("type") ?? "").trim().toLowerCase();
}

export function describeForm($: CheerioAPI, form: Element): FormDescriptor {
  const $form = $(form);
  const action = $form.attr("action") ?? "";
  const inputTypes = $form.find("input").toArray().map((el) => typeOf($, el));
  const buttonTypes = $form.find("button").toArray().map((el) => typeOf($, el));

  return {
    actionSuggestsLogin: LOGIN_ACTION_HINTS.some((hint) => action.includes(hint)),
    hasPasswordInput: inputTypes.includes("password"),
    hasUsernameLikeInput: inputTypes.some((type) => USERNAME_INPUT_TYPES.includes(type)),
    hasSubmitControl: inputTypes.includes("submit") || buttonTypes.includes("submit"),
  };
}

/**
 * `permissive`: any password input makes a login form.
 * `strict`: password, username-like input and a submit control are all required.
 * An action URL mentioning login/signin wins under both.
 */
export function isLoginForm(form: FormDescriptor, policy: LoginFormPolicy): boolean {
  if (form.actionSuggestsLogin) return true;

  if (policy === "strict") {
    return form.hasPasswordInput && form.hasUsernameLikeInput && form.hasSubmitControl;
  }
  return form.hasPasswordInput;
}

export function hasLoginForm($: CheerioAPI, forms: readonly Element[], policy: LoginFormPolicy): boolean {
  return forms.some((form) => isLoginForm(describeForm($, form), policy));
}
