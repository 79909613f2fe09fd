/**
 * Normalizacao de texto extraido de PDF.
 *
 * Funcoes puras: nenhuma depende de estado e aplicar duas vezes da o mesmo
 * resultado que aplicar uma.
 */
import type { ConfiguracaoExtracao } from '../configuracaoExtracao';
import type { PaginaBruta } from '../tipos';

const SOMENTE_MAIUSCULAS = /^[A-ZÀ-ÖØ-Þ\s]+$/u;

export function limparLinha(linha: string): string {
  return String(linha ?? '')
    .replace(/&nbsp;/gi, ' ')
    .replace(/[\t\u00a0\r]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Cabecalhos, rodapes e numeros de pagina. Linhas longas so com maiusculas
 * sao titulos corridos do caderno, nao texto de questao.
 */
export function ehLinhaRuido(
  linha: string,
  config: Pick<ConfiguracaoExtracao, 'padroesRuido' | 'limiteMaiusculas'>
): boolean {
  if (config.padroesRuido.some((padrao) => padrao.test(linha))) return true;
  return linha.length > config.limiteMaiusculas && SOMENTE_MAIUSCULAS.test(linha);
}

export function normalizarLinhas(
  linhas: readonly string[],
  config: Pick<ConfiguracaoExtracao, 'padroesRuido' | 'limiteMaiusculas'>
): string[] {
  const saida: string[] = [];
  for (const bruta of linhas) {
    const linha = limparLinha(bruta);
    if (!linha || ehLinhaRuido(linha, config)) continue;
    saida.push(linha);
  }
  return saida;
}

/** Concatena as paginas na ordem de `indice` e quebra em linhas. */
export function paginasParaLinhas(paginas: readonly PaginaBruta[]): string[] {
  return [...paginas]
    .sort((a, b) => a.indice - b.indice)
    .flatMap((pagina) => String(pagina.texto ?? '').split(/\r?\n/));
}
