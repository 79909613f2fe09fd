/**
 * Erros do pipeline de importacao.
 *
 * Rejeicoes de validacao e duplicatas NAO sao erros: viram contadores no
 * relatorio. Aqui ficam apenas as falhas que interrompem algo.
 */
import { ErroAplicacao } from '../../compartilhado/erros/erroAplicacao';

/**
 * O colaborador de extracao nao conseguiu entregar texto de um documento.
 * A fonte e registrada como falha e a execucao segue com a proxima.
 */
export class ErroFonteIlegivel extends ErroAplicacao {
  readonly fonteId: string;

  constructor(fonteId: string, mensagem: string, causa?: unknown) {
    super('FONTE_ILEGIVEL', mensagem, 422, { fonteId });
    this.name = 'ErroFonteIlegivel';
    this.fonteId = fonteId;
    if (causa !== undefined) this.cause = causa;
  }
}

/**
 * Falha fora das categorias esperadas (p. ex. configuracao malformada).
 * E a unica classe de erro que aborta a execucao inteira.
 */
export class ErroPipelineFatal extends ErroAplicacao {
  constructor(mensagem: string, detalhes?: unknown) {
    super('PIPELINE_FATAL', mensagem, 500, detalhes);
    this.name = 'ErroPipelineFatal';
  }
}
