import { describe } from "@jest/globals";
import { parseProgram } from "..";
import { convert, format } from "../../ssa";
import { sampleDir, testFilesInFolder } from "./testFilesInFolder";

describe("sample programs", () => {
    testFilesInFolder(sampleDir, source => format(convert(parseProgram(source))));
});
