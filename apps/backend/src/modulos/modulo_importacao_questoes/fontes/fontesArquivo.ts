/**
 * Fontes em disco.
 *
 * - `.txt`: saida do pdftotext; paginas separadas por form feed (`\f`).
 * - `.json`: `{ paginas: [{ indice, texto }] }` ou lista de textos de pagina.
 * - `.json` legado (`{ questoes: [...] }`): ver `lerFonteLegadaArquivo`.
 *
 * Falha de leitura ou de formato vira `ErroFonteIlegivel`, isolada na fonte.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ErroFonteIlegivel } from '../errosImportacao';
import type { FonteLegada, FonteQuestoes, PaginaBruta } from '../tipos';

const EXTENSOES_ACEITAS = new Set(['.txt', '.json']);

const esquemaPaginasJson = z.union([
  z.object({
    paginas: z.array(z.object({ indice: z.number().int().min(0), texto: z.string() }))
  }),
  z.array(z.string())
]);

/**
 * Caminho relativo a `raiz`, com extensao e separador `/`: `x/caderno.txt` e
 * `y/caderno.txt` (ou `caderno.txt` e `caderno.json`) nao colidem.
 */
export function idFonteArquivo(caminho: string, raiz: string = process.cwd()): string {
  const relativo = path.relative(path.resolve(raiz), path.resolve(caminho));
  return relativo.split(path.sep).join('/');
}

async function lerTexto(fonteId: string, caminho: string): Promise<string> {
  try {
    return await fs.readFile(caminho, 'utf8');
  } catch (erro) {
    throw new ErroFonteIlegivel(fonteId, `Nao foi possivel ler ${caminho}`, erro);
  }
}

function interpretarJson(fonteId: string, texto: string): unknown {
  try {
    return JSON.parse(texto);
  } catch (erro) {
    throw new ErroFonteIlegivel(fonteId, 'JSON invalido', erro);
  }
}

export function paginasDeTexto(fonteId: string, texto: string): PaginaBruta[] {
  return texto.split('\f').map((conteudo, indice) => ({ fonteId, indice, texto: conteudo }));
}

export function paginasDeJson(fonteId: string, conteudo: unknown): PaginaBruta[] {
  const resultado = esquemaPaginasJson.safeParse(conteudo);
  if (!resultado.success) {
    throw new ErroFonteIlegivel(fonteId, 'JSON sem paginas reconheciveis');
  }
  if (Array.isArray(resultado.data)) {
    return resultado.data.map((texto, indice) => ({ fonteId, indice, texto }));
  }
  return resultado.data.paginas.map((pagina) => ({ fonteId, indice: pagina.indice, texto: pagina.texto }));
}

/** A leitura so acontece quando o executor pede as paginas. */
export function lerFonteArquivo(caminho: string, raiz?: string): FonteQuestoes {
  const id = idFonteArquivo(caminho, raiz);
  const extensao = path.extname(caminho).toLowerCase();
  return {
    id,
    async lerPaginas() {
      if (!EXTENSOES_ACEITAS.has(extensao)) {
        throw new ErroFonteIlegivel(id, `Extensao nao suportada: ${extensao || '(nenhuma)'}`);
      }
      const texto = await lerTexto(id, caminho);
      return extensao === '.txt' ? paginasDeTexto(id, texto) : paginasDeJson(id, interpretarJson(id, texto));
    }
  };
}

export function lerFonteLegadaArquivo(caminho: string, raiz?: string): FonteLegada {
  const id = `legado:${idFonteArquivo(caminho, raiz)}`;
  return {
    id,
    async lerEntradas() {
      return interpretarJson(id, await lerTexto(id, caminho));
    }
  };
}

export async function listarFontesDiretorio(diretorio: string): Promise<string[]> {
  const nomes = await fs.readdir(diretorio);
  return nomes
    .filter((nome) => EXTENSOES_ACEITAS.has(path.extname(nome).toLowerCase()))
    .sort((a, b) => a.localeCompare(b))
    .map((nome) => path.join(diretorio, nome));
}
