/**
 * Utilidades de texto (normalizacoes/formatos).
 */

export function normalizarEspacos(valor: string): string {
  return String(valor || '')
    .trim()
    .replace(/\s+/g, ' ');
}

export function removerAcentos(valor: string): string {
  return String(valor ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Forma canonica para comparacoes e buscas: sem acentos, minusculas e com
 * espacos colapsados.
 */
export function chaveBusca(valor: string): string {
  return normalizarEspacos(removerAcentos(valor)).toLowerCase();
}

export function escaparRegex(valor: string): string {
  return valor.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
