export interface ProgramSource {
    name: string;
    source: string;
}

export const EXAMPLE_PROGRAM: ProgramSource = {
    name: "example",
    source: `x = 10;
y = x + 5;
when (x > y) {
    z = x + y;
} otherwise {
    z = x - y;
}
verify(z > 0);
`,
};

export const EXAMPLE_PROGRAM_2: ProgramSource = {
    name: "example2",
    source: `a = 10;
b = a + 5;
when (a > b) {
    c = a + b;
} otherwise {
    c = a - b;
}
verify(c > 0);
`,
};
