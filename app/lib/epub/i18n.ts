import type { Language } from "./types";

export interface Labels {
  unnamed: string;
  cover: string;
  tableOfContents: string;
  landmarks: string;
  preface: string;
  start: string;
  references: string;
}

const LABELS: Record<Language, Labels> = {
  zh: {
    unnamed: "未命名",
    cover: "封面",
    tableOfContents: "目录",
    landmarks: "导航",
    preface: "前言",
    start: "正文",
    references: "注释",
  },
  en: {
    unnamed: "Unnamed",
    cover: "Cover",
    tableOfContents: "Table of Contents",
    landmarks: "Landmarks",
    preface: "Preface",
    start: "Start",
    references: "References",
  },
};

export function getLabels(language: Language): Labels {
  return LABELS[language];
}
