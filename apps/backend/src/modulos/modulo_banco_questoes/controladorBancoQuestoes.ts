/**
 * Controlador do banco de questoes (somente leitura).
 */
import type { Request, Response } from 'express';
import { ErroAplicacao } from '../../compartilhado/erros/erroAplicacao';
import type { FiltroQuestoes, RepositorioQuestoes } from '../modulo_importacao_questoes/persistencia/repositorioQuestoes';
import type { ConsultaListarQuestoes } from './validacoesBancoQuestoes';

export function criarControladorBancoQuestoes(repositorio: RepositorioQuestoes) {
  async function listarQuestoes(_req: Request, res: Response) {
    const consulta: ConsultaListarQuestoes = res.locals.consulta;
    const { pagina, porPagina, ...resto } = consulta;
    const filtro: FiltroQuestoes = resto;

    const { total, questoes } = await repositorio.listar(filtro, { pagina, porPagina });
    res.json({ total, pagina, porPagina, totalPaginas: Math.ceil(total / porPagina), questoes });
  }

  async function obterEstatisticas(_req: Request, res: Response) {
    res.json(await repositorio.obterEstatisticas());
  }

  async function obterQuestao(req: Request, res: Response) {
    const questaoId = String(req.params.questaoId ?? '').trim();
    const questao = await repositorio.obterPorId(questaoId);
    if (!questao) {
      throw new ErroAplicacao('QUESTAO_NAO_ENCONTRADA', 'Questao nao encontrada', 404);
    }
    res.json({ questao });
  }

  return { listarQuestoes, obterEstatisticas, obterQuestao };
}
