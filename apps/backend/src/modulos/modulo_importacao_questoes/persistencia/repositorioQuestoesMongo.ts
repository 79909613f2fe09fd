/**
 * Repositorio Mongoose do banco de questoes.
 */
import { Types } from 'mongoose';
import { normalizarDificuldade } from '../registro/normalizadorRegistro';
import {
  LETRAS_ALTERNATIVAS,
  SENTINELA_REVISAO,
  ehLetraAlternativa,
  type Alternativas,
  type Dificuldade,
  type RegistroQuestao
} from '../tipos';
import { Questao } from './modeloQuestao';
import type {
  EstatisticasQuestoes,
  FiltroQuestoes,
  PaginaQuestoes,
  Paginacao,
  QuestaoPersistida,
  RepositorioQuestoes,
  ResultadoLote
} from './repositorioQuestoes';

type DocumentoLido = {
  _id: unknown;
  fonteId?: unknown;
  numero?: unknown;
  disciplina?: unknown;
  topico?: unknown;
  enunciado?: unknown;
  alternativas?: Record<string, unknown> | null;
  respostaCorreta?: unknown;
  explicacao?: unknown;
  fundamentacaoLegal?: unknown;
  dificuldade?: unknown;
  anoProva?: unknown;
  tags?: unknown;
  hashConteudo?: unknown;
};

function texto(valor: unknown): string {
  return typeof valor === 'string' ? valor : '';
}

export function paraQuestaoPersistida(doc: DocumentoLido): QuestaoPersistida {
  const alternativas: Alternativas = {};
  for (const letra of LETRAS_ALTERNATIVAS) {
    const valor = doc.alternativas?.[letra];
    if (typeof valor === 'string' && valor) alternativas[letra] = valor;
  }
  const resposta = texto(doc.respostaCorreta);
  const anoProva = typeof doc.anoProva === 'number' ? doc.anoProva : undefined;

  return {
    id: String(doc._id),
    fonteId: texto(doc.fonteId),
    numero: typeof doc.numero === 'number' ? doc.numero : 0,
    disciplina: texto(doc.disciplina),
    topico: texto(doc.topico),
    enunciado: texto(doc.enunciado),
    alternativas,
    respostaCorreta: ehLetraAlternativa(resposta) ? resposta : SENTINELA_REVISAO,
    explicacao: texto(doc.explicacao),
    fundamentacaoLegal: texto(doc.fundamentacaoLegal),
    dificuldade: normalizarDificuldade(doc.dificuldade),
    ...(anoProva === undefined ? {} : { anoProva }),
    tags: Array.isArray(doc.tags) ? doc.tags.filter((tag): tag is string => typeof tag === 'string') : [],
    hashConteudo: texto(doc.hashConteudo)
  };
}

function paraDocumento(registro: RegistroQuestao) {
  return {
    fonteId: registro.fonteId,
    numero: registro.numero,
    disciplina: registro.disciplina,
    topico: registro.topico,
    enunciado: registro.enunciado,
    alternativas: { ...registro.alternativas },
    respostaCorreta: registro.respostaCorreta,
    explicacao: registro.explicacao,
    fundamentacaoLegal: registro.fundamentacaoLegal,
    dificuldade: registro.dificuldade,
    ...(registro.anoProva === undefined ? {} : { anoProva: registro.anoProva }),
    tags: [...registro.tags],
    hashConteudo: registro.hashConteudo
  };
}

function filtroMongo(filtro: FiltroQuestoes): Record<string, unknown> {
  const consulta: Record<string, unknown> = {};
  if (filtro.disciplina) consulta.disciplina = filtro.disciplina;
  if (filtro.dificuldade) consulta.dificuldade = filtro.dificuldade;
  if (filtro.respostaCorreta) consulta.respostaCorreta = filtro.respostaCorreta;
  if (filtro.fonteId) consulta.fonteId = filtro.fonteId;
  return consulta;
}

export class RepositorioQuestoesMongo implements RepositorioQuestoes {
  async salvarLote(registros: readonly RegistroQuestao[]): Promise<ResultadoLote> {
    if (registros.length === 0) return { inseridos: 0, existentes: 0 };

    const resultado = await Questao.bulkWrite(
      registros.map((registro) => ({
        updateOne: {
          filter: { hashConteudo: registro.hashConteudo },
          update: { $setOnInsert: paraDocumento(registro) },
          upsert: true
        }
      })),
      { ordered: false }
    );
    const inseridos = resultado.upsertedCount;
    return { inseridos, existentes: registros.length - inseridos };
  }

  async listar(filtro: FiltroQuestoes, paginacao: Paginacao): Promise<PaginaQuestoes> {
    const consulta = filtroMongo(filtro);
    const [total, documentos] = await Promise.all([
      Questao.countDocuments(consulta),
      Questao.find(consulta)
        .sort({ disciplina: 1, fonteId: 1, numero: 1 })
        .skip((paginacao.pagina - 1) * paginacao.porPagina)
        .limit(paginacao.porPagina)
        .lean<DocumentoLido[]>()
    ]);
    return { total, questoes: documentos.map(paraQuestaoPersistida) };
  }

  async obterPorId(id: string): Promise<QuestaoPersistida | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const documento = await Questao.findById(id).lean<DocumentoLido>();
    return documento ? paraQuestaoPersistida(documento) : null;
  }

  async obterEstatisticas(): Promise<EstatisticasQuestoes> {
    const [total, pendentesRevisao, disciplinas, dificuldades] = await Promise.all([
      Questao.countDocuments({}),
      Questao.countDocuments({ respostaCorreta: SENTINELA_REVISAO }),
      Questao.aggregate<{ _id: string; total: number }>([
        { $group: { _id: '$disciplina', total: { $sum: 1 } } },
        { $sort: { total: -1, _id: 1 } }
      ]),
      Questao.aggregate<{ _id: string; total: number }>([{ $group: { _id: '$dificuldade', total: { $sum: 1 } } }])
    ]);

    const porDificuldade: Record<Dificuldade, number> = { facil: 0, medio: 0, dificil: 0 };
    for (const item of dificuldades) porDificuldade[normalizarDificuldade(item._id)] += item.total;

    return {
      total,
      pendentesRevisao,
      porDisciplina: disciplinas.map((item) => ({ disciplina: item._id, total: item.total })),
      porDificuldade
    };
  }
}
