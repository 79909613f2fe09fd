/**
 * Rotas do banco de questoes.
 */
import { Router } from 'express';
import { validarConsulta } from '../../compartilhado/validacoes/validar';
import type { RepositorioQuestoes } from '../modulo_importacao_questoes/persistencia/repositorioQuestoes';
import { criarControladorBancoQuestoes } from './controladorBancoQuestoes';
import { esquemaListarQuestoes } from './validacoesBancoQuestoes';

export function criarRotasBancoQuestoes(repositorio: RepositorioQuestoes) {
  const router = Router();
  const controlador = criarControladorBancoQuestoes(repositorio);

  router.get('/', validarConsulta(esquemaListarQuestoes), controlador.listarQuestoes);
  // Antes de `/:questaoId`, senao "estatisticas" seria lido como id.
  router.get('/estatisticas', controlador.obterEstatisticas);
  router.get('/:questaoId', controlador.obterQuestao);

  return router;
}
