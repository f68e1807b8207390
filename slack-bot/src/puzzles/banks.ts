export type TriviaLabel = "A" | "B" | "C" | "D";

export type TriviaQuestion = {
    question: string;
    options: Record<TriviaLabel, string>;
    answer: TriviaLabel;
};

export type EmojiPuzzle = {
    answer: string;
    emojis: string;
};

export const TRIVIA_LABELS: readonly TriviaLabel[] = ["A", "B", "C", "D"];

export const WORD_BANK: readonly string[] = [
    "komputer", "discord", "python", "internet", "keyboard", "monitor",
    "program", "database", "jaringan", "teknologi", "aplikasi", "algoritma",
];

export const EMOJI_BANK: readonly EmojiPuzzle[] = [
    { answer: "pizza", emojis: "🍕🧀🍅" },
    { answer: "hujan", emojis: "☁️🌧️☔" },
    { answer: "kucing", emojis: "🐱🐾🐟" },
    { answer: "pantai", emojis: "🏖️🌊☀️" },
    { answer: "sekolah", emojis: "🏫📚📝" },
    { answer: "pesawat", emojis: "✈️☁️🧳" },
    { answer: "kopi", emojis: "☕🌙💻" },
    { answer: "rumah", emojis: "🏠🛋️🚪" },
];

export const TRIVIA_BANK: readonly TriviaQuestion[] = [
    {
        question: "Planet terbesar di tata surya adalah...",
        options: { A: "Mars", B: "Jupiter", C: "Bumi", D: "Saturnus" },
        answer: "B",
    },
    {
        question: "Bahasa yang dipakai untuk menulis bot ini adalah...",
        options: { A: "Java", B: "Go", C: "TypeScript", D: "Rust" },
        answer: "C",
    },
    {
        question: "Siapa penemu lampu pijar yang populer secara komersial?",
        options: { A: "Nikola Tesla", B: "Thomas Edison", C: "Albert Einstein", D: "Galileo Galilei" },
        answer: "B",
    },
    {
        question: "Hasil dari 9 x 8 adalah...",
        options: { A: "72", B: "81", C: "64", D: "69" },
        answer: "A",
    },
];
