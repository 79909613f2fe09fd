/**
 * Consolidacao de conjuntos JSON extraidos anteriormente.
 *
 * Cada conjunto vira uma `FonteLegada` e passa pelo mesmo normalizador e pelo
 * mesmo deduplicador das fontes em PDF.
 */
import { executarImportacao, type OpcoesImportacao } from '../pipeline/executorImportacao';
import type { FonteLegada, ResultadoImportacao } from '../tipos';

export type ConjuntoLegado = {
  id: string;
  conteudo: unknown;
};

export function criarFonteLegada(conjunto: ConjuntoLegado): FonteLegada {
  return {
    id: conjunto.id,
    lerEntradas: () => conjunto.conteudo
  };
}

export function importarRegistrosLegados(
  conjuntos: readonly ConjuntoLegado[],
  opcoes: OpcoesImportacao = {}
): Promise<ResultadoImportacao> {
  return executarImportacao(conjuntos.map(criarFonteLegada), opcoes);
}
