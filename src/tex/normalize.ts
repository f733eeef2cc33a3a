/**
 * Rewrites the TeX idioms used in scripts into plain text:
 *
 * - `\ldots` / `\textellipsis` → `...` (with a trailing space for the `{}` form)
 * - ``` ``abc'' ``` → `"abc"`
 * - `\$ \& \%` → `$ & %`
 * - `\kaosmile{}` → `^_^ `
 * - `\Tilde{}` → `∼`
 * - `\href{URL}{TEXT}` → `[TEXT](URL)`
 *
 * then collapses ASCII whitespace and trims. Unknown commands are left as they are.
 */
export function unescapeTex(text: string): string {
  return text
    .replaceAll('\\ldots{}', '... ')
    .replaceAll('\\ldots', '...')
    .replaceAll('\\textellipsis{}', '... ')
    .replaceAll('\\textellipsis', '...')
    .replace(/``(.*?)''/g, '"$1"')
    .replace(/\\([%&$])/g, '$1')
    .replace(/\\kaosmile(\{\})?/g, '^_^ ')
    .replace(/\\Tilde(\{\})?/g, '∼')
    .replace(/\\href\{(.*?)\}\{(.*?)\}/g, '[$2]($1)')
    .replace(/[ \t\n\v\f\r]+/g, ' ')
    .trim()
}
