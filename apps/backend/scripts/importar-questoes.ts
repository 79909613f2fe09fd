/**
 * Importa questoes de arquivos de texto (saida do pdftotext) e de conjuntos
 * JSON legados, imprime o relatorio e, opcionalmente, exporta e persiste.
 *
 * Uso: npm run importar -- --dir ./provas --saida ./saida/banco.json --persistir
 */
import { ErroAplicacao } from '../src/compartilhado/erros/erroAplicacao';
import { conectarBaseDados, desconectarBaseDados } from '../src/infraestrutura/baseDados/mongoose';
import { log, logError } from '../src/infraestrutura/logging/logger';
import {
  USO_IMPORTACAO,
  lerArgumentosImportacao,
  type ArgumentosImportacao
} from '../src/modulos/modulo_importacao_questoes/cli/argumentosImportacao';
import { exportarConsolidado } from '../src/modulos/modulo_importacao_questoes/exportacao/exportarConsolidado';
import {
  lerFonteArquivo,
  lerFonteLegadaArquivo,
  listarFontesDiretorio
} from '../src/modulos/modulo_importacao_questoes/fontes/fontesArquivo';
import { RepositorioQuestoesMongo } from '../src/modulos/modulo_importacao_questoes/persistencia/repositorioQuestoesMongo';
import { executarImportacao } from '../src/modulos/modulo_importacao_questoes/pipeline/executorImportacao';
import type { FonteImportacao } from '../src/modulos/modulo_importacao_questoes/tipos';

async function montarFontes(argumentos: ArgumentosImportacao): Promise<FonteImportacao[]> {
  const caminhos = argumentos.diretorio ? await listarFontesDiretorio(argumentos.diretorio) : [];
  return [
    ...[...caminhos, ...argumentos.arquivos].map((caminho) => lerFonteArquivo(caminho)),
    ...argumentos.legados.map((caminho) => lerFonteLegadaArquivo(caminho))
  ];
}

async function main() {
  const argumentos = lerArgumentosImportacao(process.argv);
  if (argumentos.ajuda) {
    console.log(USO_IMPORTACAO);
    return;
  }

  const fontes = await montarFontes(argumentos);
  const { registros, relatorio } = await executarImportacao(fontes, {
    configuracao: argumentos.maximoQuestoes ? { maximoQuestoes: argumentos.maximoQuestoes } : {}
  });
  log('info', 'Relatorio de importacao', { relatorio });

  if (argumentos.saida) {
    await exportarConsolidado(registros, relatorio, argumentos.saida);
    log('ok', 'Banco consolidado exportado', { caminho: argumentos.saida, totalQuestoes: registros.length });
  }

  if (argumentos.persistir) {
    const conectado = await conectarBaseDados();
    if (!conectado) {
      throw new ErroAplicacao('PERSISTENCIA_INDISPONIVEL', 'MONGODB_URI nao definido', 503);
    }
    try {
      const resultado = await new RepositorioQuestoesMongo().salvarLote(registros);
      log('ok', 'Questoes persistidas', resultado);
    } finally {
      await desconectarBaseDados();
    }
  }
}

main().catch((erro) => {
  if (erro instanceof ErroAplicacao && erro.codigo === 'ARGUMENTO_INVALIDO') console.error(USO_IMPORTACAO);
  logError('Importacao falhou', erro);
  process.exitCode = 1;
});
