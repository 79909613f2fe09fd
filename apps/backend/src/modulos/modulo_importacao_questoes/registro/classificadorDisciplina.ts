/**
 * Classificacao de disciplina por palavra-chave.
 *
 * Melhor esforco: a primeira disciplina da tabela com alguma palavra-chave no
 * enunciado vence. Palavras-chave casam no inicio de palavra, sem acentos.
 */
import tabela from '../dados/palavrasChaveDisciplinas.json';
import { chaveBusca, escaparRegex } from '../../../compartilhado/utilidades/texto';

type EntradaTabela = { disciplina: string; padroes: RegExp[] };

const TABELA: EntradaTabela[] = tabela.map(({ disciplina, palavrasChave }) => ({
  disciplina,
  padroes: palavrasChave.map((palavra) => new RegExp(`(?:^|[^a-z0-9])${escaparRegex(chaveBusca(palavra))}`))
}));

export function classificarDisciplina(enunciado: string): string | undefined {
  const texto = chaveBusca(enunciado);
  if (!texto) return undefined;
  return TABELA.find((entrada) => entrada.padroes.some((padrao) => padrao.test(texto)))?.disciplina;
}
