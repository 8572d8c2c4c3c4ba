export default `Extract the questions from the following text:

{{MARKDOWN}}`;
