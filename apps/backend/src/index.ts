/**
 * Ponto de entrada da API.
 * Inicializa configuracao, banco de dados e servidor HTTP.
 */
import { criarApp } from './app';
import { configuracao } from './configuracao';
import { conectarBaseDados } from './infraestrutura/baseDados/mongoose';
import { log, logError } from './infraestrutura/logging/logger';
import { Questao } from './modulos/modulo_importacao_questoes/persistencia/modeloQuestao';
import { RepositorioQuestoesMongo } from './modulos/modulo_importacao_questoes/persistencia/repositorioQuestoesMongo';

async function iniciar() {
  const conectado = await conectarBaseDados();
  if (conectado) await Questao.syncIndexes();

  const app = criarApp(conectado ? { repositorio: new RepositorioQuestoesMongo() } : {});
  app.listen(configuracao.porta, () => {
    log('ok', 'API do banco de questoes ouvindo', { porta: configuracao.porta, persistencia: conectado });
  });
}

iniciar().catch((erro) => {
  logError('Erro ao iniciar o servidor', erro);
  process.exit(1);
});
