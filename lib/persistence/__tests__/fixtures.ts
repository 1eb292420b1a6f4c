import type { WriteRecords } from "../types";

export function sampleRecords(): WriteRecords {
  return {
    ebook: {
      title_en: "Men's Protocol",
      title_pt: "Protocolo Masculino",
      slug: "mens-protocol",
      description_en: "A plan for the week's training.",
      description_pt: null,
      cover_image_url: "https://cdn.test/covers/mens-protocol/cover.png",
      price_usd: 1997,
      price_brl: 9970,
      estimated_read_time_minutes: 7,
      status: "draft",
    },
    chapters: [1, 2].map((n) => ({
      chapter_number: n,
      title_en: `Day ${n}`,
      title_pt: `Dia ${n}`,
      slug: `day-${n}`,
      cover_image_url: `images/chapter_${n}.png`,
      content_en: `<p>It's day ${n}</p>`,
      content_pt: "",
      summary_en: "Summary",
      summary_pt: "Resumo",
      estimated_read_time_minutes: n === 1 ? 4 : 3,
      is_free_preview: n === 1,
      is_published: false,
    })),
    notices: [],
  };
}
