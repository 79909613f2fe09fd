/**
 * Contrato de persistencia do banco de questoes.
 *
 * O pipeline nao conhece o MongoDB: recebe um `RepositorioQuestoes`. A API e o
 * script usam a implementacao Mongoose; os testes usam uma em memoria.
 */
import type { Dificuldade, RegistroQuestao, RespostaCorreta } from '../tipos';

export type FiltroQuestoes = {
  disciplina?: string;
  dificuldade?: Dificuldade;
  respostaCorreta?: RespostaCorreta;
  fonteId?: string;
};

export type Paginacao = { pagina: number; porPagina: number };

export type QuestaoPersistida = RegistroQuestao & { id: string };

export type PaginaQuestoes = { total: number; questoes: QuestaoPersistida[] };

export type EstatisticasQuestoes = {
  total: number;
  pendentesRevisao: number;
  porDisciplina: Array<{ disciplina: string; total: number }>;
  porDificuldade: Record<Dificuldade, number>;
};

export type ResultadoLote = { inseridos: number; existentes: number };

export interface RepositorioQuestoes {
  /**
   * Upsert idempotente por `hashConteudo`. Uma questao ja gravada nao e
   * alterada: a primeira versao vista continua valendo tambem no banco.
   */
  salvarLote(registros: readonly RegistroQuestao[]): Promise<ResultadoLote>;
  listar(filtro: FiltroQuestoes, paginacao: Paginacao): Promise<PaginaQuestoes>;
  obterPorId(id: string): Promise<QuestaoPersistida | null>;
  obterEstatisticas(): Promise<EstatisticasQuestoes>;
}

/** Ordem estavel de listagem: disciplina, fonte, numero. */
export function compararQuestoes(a: RegistroQuestao, b: RegistroQuestao): number {
  return (
    a.disciplina.localeCompare(b.disciplina) || a.fonteId.localeCompare(b.fonteId) || a.numero - b.numero
  );
}
